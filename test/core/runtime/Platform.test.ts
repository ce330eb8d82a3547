import { detectPlatform, platformSuffix } from '../../../src/core/runtime/Platform';

describe('Platform', () => {
  describe('detectPlatform', () => {
    it('should map glibc linux on x64 to the gnu v3 build', () => {
      const tag = detectPlatform({ platform: 'linux', arch: 'x64', glibcVersion: '2.35' });

      expect(tag).toEqual({ os: 'unknown-linux-gnu', arch: 'x86_64_v3' });
    });

    it('should map linux without glibc to musl', () => {
      const tag = detectPlatform({ platform: 'linux', arch: 'arm64' });

      expect(tag).toEqual({ os: 'unknown-linux-musl', arch: 'aarch64' });
    });

    it('should map macOS on arm64', () => {
      const tag = detectPlatform({ platform: 'darwin', arch: 'arm64' });

      expect(tag).toEqual({ os: 'apple-darwin', arch: 'aarch64' });
    });

    it('should reject unsupported operating systems', () => {
      expect(() => detectPlatform({ platform: 'win32', arch: 'x64' })).toThrow('Unsupported OS: win32');
    });

    it('should reject unsupported architectures', () => {
      expect(() => detectPlatform({ platform: 'linux', arch: 'ia32', glibcVersion: '2.35' })).toThrow(
        'Unsupported architecture: ia32'
      );
    });
  });

  describe('platformSuffix', () => {
    it('should join architecture and OS', () => {
      expect(platformSuffix({ os: 'apple-darwin', arch: 'x86_64_v3' })).toBe('x86_64_v3-apple-darwin');
    });
  });
});

import { PlatformTag } from '../../types/Runtime';

export interface HostInfo {
  platform: NodeJS.Platform;
  arch: string;
  /** glibc version reported by the runtime; absent on musl systems */
  glibcVersion?: string | undefined;
}

function glibcVersionRuntime(): string | undefined {
  const report: unknown = process.report?.getReport();
  if (typeof report !== 'object' || report === null || !('header' in report)) {
    return undefined;
  }
  const header: unknown = report.header;
  if (typeof header !== 'object' || header === null || !('glibcVersionRuntime' in header)) {
    return undefined;
  }
  return typeof header.glibcVersionRuntime === 'string' ? header.glibcVersionRuntime : undefined;
}

export function currentHost(): HostInfo {
  return {
    platform: process.platform,
    arch: process.arch,
    glibcVersion: process.platform === 'linux' ? glibcVersionRuntime() : undefined,
  };
}

/**
 * Tag pair used by the precompiled builds, e.g. `x86_64_v3` + `unknown-linux-gnu`
 */
export function detectPlatform(host: HostInfo = currentHost()): PlatformTag {
  return { os: osTag(host), arch: archTag(host) };
}

export function platformSuffix(tag: PlatformTag): string {
  return `${tag.arch}-${tag.os}`;
}

function osTag(host: HostInfo): PlatformTag['os'] {
  switch (host.platform) {
    case 'linux':
      return host.glibcVersion ? 'unknown-linux-gnu' : 'unknown-linux-musl';
    case 'darwin':
      return 'apple-darwin';
    default:
      throw new Error(`Unsupported OS: ${host.platform}`);
  }
}

function archTag(host: HostInfo): PlatformTag['arch'] {
  switch (host.arch) {
    case 'x64':
      // TODO: allow choosing the x86-64 microarchitecture level instead of assuming v3
      return 'x86_64_v3';
    case 'arm64':
      return 'aarch64';
    default:
      throw new Error(`Unsupported architecture: ${host.arch}`);
  }
}

import * as fs from 'fs-extra';
import { extract as tarExtract } from 'tar';

export type ExtractOptions = {
  archivePath: string;
  destination: string;
  stripComponents?: number;
};

export function getArchiveType(filename: string): 'tar.gz' | 'unknown' {
  if (filename.endsWith('.tar.gz') || filename.endsWith('.tgz')) {
    return 'tar.gz';
  }
  return 'unknown';
}

export async function extractArchive(options: ExtractOptions): Promise<void> {
  const { archivePath, destination, stripComponents = 0 } = options;

  if (getArchiveType(archivePath) === 'unknown') {
    throw new Error(`Unknown archive type for ${archivePath}. Supported formats: .tar.gz, .tgz`);
  }

  await fs.ensureDir(destination);
  await tarExtract({
    file: archivePath,
    cwd: destination,
    strip: stripComponents,
  });
}

import * as fs from 'fs-extra';
import * as path from 'path';
import { Settings } from '../../../types/Config';
import { InstallTarget, PrecompiledEntry, ProgressReporter } from '../../../types/Runtime';
import { extractArchive } from '../../../utils/Archive';
import { ProvisionError, errorMessage } from '../../../utils/Errors';
import { FileSystem } from '../../../utils/FileSystem';
import { HttpClient, formatBytes } from '../../../utils/HttpClient';
import { logger } from '../../../utils/Logger';
import { PythonCatalog } from './PythonCatalog';

export const PRECOMPILED_RELEASES_URL =
  'https://github.com/indygreg/python-build-standalone/releases/download';

export function precompiledUrl(entry: PrecompiledEntry): string {
  return `${PRECOMPILED_RELEASES_URL}/${entry.releaseTag}/${entry.filename}`;
}

/**
 * Installs python-build-standalone builds: download, unpack, move into place, relink
 */
export class PrecompiledInstaller {
  constructor(private readonly catalog: PythonCatalog) {}

  async install(
    target: InstallTarget,
    reporter: ProgressReporter,
    settings: Settings
  ): Promise<void> {
    logger.warn('installing precompiled python from indygreg/python-build-standalone');
    logger.warn('if you experience issues with this python, switch to python-build');
    logger.warn('by running: pyprov settings set python_compile 1');

    const entry = await this.catalog.select(target.version, settings);
    if (!entry) {
      throw new ProvisionError(
        'selection',
        `no precompiled version found for python@${target.version}`
      );
    }

    const url = precompiledUrl(entry);
    const filename = url.split('/').pop() ?? entry.filename;
    const tarball = path.join(target.downloadPath, filename);

    reporter.setMessage(`downloading ${url}`);
    try {
      await HttpClient.downloadFile(url, tarball, (downloaded, total) =>
        reporter.setMessage(
          `downloading ${filename} ${formatBytes(downloaded)}${total > 0 ? `/${formatBytes(total)}` : ''}`
        )
      );
    } catch (error) {
      throw new ProvisionError(
        'catalog',
        `Failed to download python@${target.version}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    reporter.setMessage(`installing ${tarball}`);
    const extracted = path.join(target.downloadPath, 'python');
    await FileSystem.removeAll(extracted);
    await extractArchive({ archivePath: tarball, destination: target.downloadPath });
    if (!(await fs.pathExists(extracted))) {
      throw new ProvisionError(
        'validation',
        `${filename} did not contain a python/ directory; cannot install python@${target.version}`
      );
    }

    await FileSystem.removeAll(target.installPath);
    await FileSystem.move(extracted, target.installPath);
    await FileSystem.makeSymlink(
      path.join(target.installPath, 'bin', 'python3'),
      path.join(target.installPath, 'bin', 'python')
    );
    logger.debug(`installed ${entry.filename} to ${target.installPath}`);
  }
}

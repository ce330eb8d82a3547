import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';

export const PROJECT_ROOT_INDICATORS = ['.pyprov.yml', '.python-version', '.git'];

export class FileSystem {
  static async findProjectRoot(startPath: string = process.cwd()): Promise<string | null> {
    let currentPath = path.resolve(startPath);
    const root = path.parse(currentPath).root;

    while (currentPath !== root) {
      for (const indicator of PROJECT_ROOT_INDICATORS) {
        if (await fs.pathExists(path.join(currentPath, indicator))) {
          return currentPath;
        }
      }
      currentPath = path.dirname(currentPath);
    }

    return null;
  }

  /**
   * Expand a leading `~` and `$VAR` / `${VAR}` references. Unset variables expand to nothing.
   */
  static expandPath(input: string, env: NodeJS.ProcessEnv = process.env): string {
    const withVars = input.replace(
      /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g,
      (_match, braced: string | undefined, bare: string | undefined) => env[braced ?? bare ?? ''] ?? ''
    );

    if (withVars === '~') {
      return os.homedir();
    }
    if (withVars.startsWith('~/')) {
      return path.join(os.homedir(), withVars.slice(2));
    }
    return withVars;
  }

  /**
   * Shorten a path under the home directory to `~/...` for display
   */
  static displayPath(filePath: string): string {
    const home = os.homedir();
    if (filePath === home) return '~';
    if (filePath.startsWith(home + path.sep)) {
      return `~${filePath.slice(home.length)}`;
    }
    return filePath;
  }

  /**
   * Replace a file by writing a sibling temp file and renaming it over the target,
   * so readers in other processes see either the old or the new contents.
   */
  static async writeFileAtomic(filePath: string, data: Buffer | string): Promise<void> {
    const dir = path.dirname(filePath);
    const tempPath = path.join(
      dir,
      `.${path.basename(filePath)}.${process.pid}.${Math.random().toString(36).slice(2)}.tmp`
    );

    try {
      await fs.ensureDir(dir);
      await fs.writeFile(tempPath, data);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.remove(tempPath).catch(() => undefined);
      throw new Error(
        `Failed to write ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  static async removeAll(targetPath: string): Promise<void> {
    try {
      await fs.remove(targetPath);
    } catch (error) {
      throw new Error(
        `Failed to remove ${targetPath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  static async move(source: string, destination: string): Promise<void> {
    try {
      await fs.ensureDir(path.dirname(destination));
      await fs.move(source, destination, { overwrite: true });
    } catch (error) {
      throw new Error(
        `Failed to move ${source} to ${destination}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  /**
   * Point `linkPath` at `target`, replacing whatever was at `linkPath`
   */
  static async makeSymlink(target: string, linkPath: string): Promise<void> {
    try {
      await fs.remove(linkPath);
      await fs.ensureDir(path.dirname(linkPath));
      await fs.symlink(target, linkPath);
    } catch (error) {
      throw new Error(
        `Failed to link ${linkPath} to ${target}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }
}

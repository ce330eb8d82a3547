import { createWriteStream } from 'fs';
import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from './Logger';

const USER_AGENT = 'pyprov/0.1.0';
const REQUEST_TIMEOUT = 30_000;

export type DownloadProgress = (downloaded: number, total: number) => void;

export class HttpClient {
  static async getText(url: string): Promise<string> {
    logger.debug(`GET ${url}`);

    const response = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT),
    });

    if (!response.ok) {
      throw new Error(`GET ${url} failed: ${response.status} ${response.statusText}`);
    }

    return response.text();
  }

  /**
   * Stream `url` into `destination`. A partial file is removed when the transfer fails.
   */
  static async downloadFile(
    url: string,
    destination: string,
    onProgress?: DownloadProgress
  ): Promise<void> {
    logger.debug(`GET ${url} -> ${destination}`);
    await fs.ensureDir(path.dirname(destination));

    const response = await fetch(url, { headers: { 'User-Agent': USER_AGENT } });

    if (!response.ok) {
      throw new Error(`Failed to download ${url}: ${response.status} ${response.statusText}`);
    }
    if (!response.body) {
      throw new Error(`No response body received from ${url}`);
    }

    const total = Number(response.headers.get('content-length')) || 0;
    let downloaded = 0;
    const fileStream = createWriteStream(destination);
    let streamError: Error | undefined;
    fileStream.on('error', error => {
      streamError = error;
    });
    const reader = response.body.getReader();

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        if (streamError) throw streamError;

        fileStream.write(value);
        downloaded += value.length;
        onProgress?.(downloaded, total);
      }

      fileStream.end();
      await new Promise<void>((resolve, reject) => {
        if (streamError) {
          reject(streamError);
          return;
        }
        fileStream.on('finish', resolve);
        fileStream.on('error', reject);
      });
    } catch (error) {
      fileStream.destroy();
      await fs.remove(destination);
      throw error;
    }
  }
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`;
}

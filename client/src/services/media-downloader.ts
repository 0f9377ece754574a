import * as fs from 'fs';
import * as http from 'http';
import * as https from 'https';
import * as path from 'path';
import { TransportError } from '../errors';
import { logger } from '../logger';

const MAX_REDIRECTS = 5;

/** Fetches one remote file to a local path. Resolves with the byte count written. */
export interface MediaDownloader {
  download(url: string, dest: string, signal: AbortSignal): Promise<number>;
}

/**
 * Streams the response into `<dest>.tmp` and renames it over `dest` once the
 * body is complete. An interrupted download leaves only the `.tmp` file behind,
 * which the next attempt overwrites.
 */
export class HttpMediaDownloader implements MediaDownloader {
  constructor(private readonly timeoutMs: number) {}

  public async download(url: string, dest: string, signal: AbortSignal): Promise<number> {
    await fs.promises.mkdir(path.dirname(dest), { recursive: true });
    const tmpDest = `${dest}.tmp`;
    const bytes = await this.fetchToFile(url, tmpDest, signal, 0);

    if (bytes === 0) {
      await fs.promises.unlink(tmpDest).catch((error: unknown) => {
        logger.debug(`Could not remove ${tmpDest}: ${String(error)}`);
      });
      throw new TransportError(`Empty response body from ${url}`);
    }

    await fs.promises.rename(tmpDest, dest);
    return bytes;
  }

  private fetchToFile(url: string, tmpDest: string, signal: AbortSignal, redirects: number): Promise<number> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(new TransportError(`Download aborted: ${url}`));
        return;
      }

      const onResponse = (response: http.IncomingMessage): void => {
        const status = response.statusCode ?? 0;

        if (status >= 300 && status < 400 && response.headers.location) {
          response.resume();
          if (redirects >= MAX_REDIRECTS) {
            reject(new TransportError(`Too many redirects for ${url}`, status));
            return;
          }
          const next = new URL(response.headers.location, url).toString();
          logger.debug(`Following redirect ${status} to ${next}`);
          this.fetchToFile(next, tmpDest, signal, redirects + 1).then(resolve, reject);
          return;
        }

        if (status !== 200) {
          response.resume();
          reject(new TransportError(`HTTP ${status} ${response.statusMessage ?? ''}`.trim(), status));
          return;
        }

        const totalSize = parseInt(response.headers['content-length'] || '0', 10);
        let downloadedSize = 0;
        let lastLoggedPercent = 0;

        response.on('data', (chunk: Buffer) => {
          downloadedSize += chunk.length;
          if (totalSize > 0) {
            const percent = Math.floor((downloadedSize / totalSize) * 100);
            // Log every 10%
            if (percent >= lastLoggedPercent + 10) {
              logger.debug(
                `Downloading ${path.basename(tmpDest, '.tmp')}: ${percent}% (${(downloadedSize / 1024 / 1024).toFixed(1)} MB)`,
              );
              lastLoggedPercent = percent;
            }
          }
        });

        const file = fs.createWriteStream(tmpDest);
        response.pipe(file);

        response.on('error', (err: Error) => {
          file.destroy();
          reject(new TransportError(`Download interrupted: ${err.message}`, undefined, { cause: err }));
        });

        file.on('error', (err: Error) => {
          response.destroy();
          reject(err);
        });

        file.on('finish', () => {
          file.close(() => {
            if (totalSize > 0 && downloadedSize < totalSize) {
              reject(new TransportError(`Truncated download: ${downloadedSize}/${totalSize} bytes`));
              return;
            }
            resolve(downloadedSize);
          });
        });
      };

      const request = url.startsWith('https')
        ? https.get(url, { signal }, onResponse)
        : http.get(url, { signal }, onResponse);

      request.on('error', (err: Error) => {
        reject(new TransportError(`Request failed for ${url}: ${err.message}`, undefined, { cause: err }));
      });

      request.setTimeout(this.timeoutMs, () => {
        request.destroy(new Error('Download timeout'));
      });
    });
  }
}

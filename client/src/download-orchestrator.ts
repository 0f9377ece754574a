import * as fs from 'fs';
import * as path from 'path';
import pLimit from 'p-limit';
import type { DownloadFailure, DownloadProgress, DownloadSummary, Video } from '@adloop/shared';
import type { CatalogStore } from './catalog-store';
import { StorageError, errorMessage } from './errors';
import { logger } from './logger';
import { isNotFound } from './store/key-value-store';
import type { MediaDownloader } from './services/media-downloader';
import { EventEmitter } from './utils/event-emitter';

export type DownloadEvents = {
  progress: DownloadProgress;
  error: DownloadFailure;
  complete: DownloadSummary;
};

export interface DownloadOrchestratorOptions {
  mediaDir: string;
  proxyUrl: string;
  concurrency: number;
  maxRetries: number;
  retryDelayMs: number;
  minFreeDiskBytes: number;
  /** Storage guard; resolves false when the media volume is too full to download into. */
  hasFreeSpace?: (minBytes: number) => Promise<boolean>;
}

const MAX_RETRY_DELAY_MS = 60000;
const FILE_PREFIX = 'video_';
const FILE_EXT = '.mp4';

/**
 * Progress of one `syncDownloads` run. Subscribe right after the call returns;
 * no event fires before the next microtask.
 */
export class ProgressStream extends EventEmitter<DownloadEvents> {
  public readonly done: Promise<DownloadSummary>;

  constructor(run: (stream: ProgressStream) => Promise<DownloadSummary>) {
    super();
    this.done = Promise.resolve().then(() => run(this));
  }
}

export function localPathFor(mediaDir: string, videoId: string): string {
  const safeId = videoId.replace(/[^A-Za-z0-9_-]/g, '_');
  return path.join(mediaDir, `${FILE_PREFIX}${safeId}${FILE_EXT}`);
}

/** Remote URL to fetch; clipped assets are cut server-side by the media proxy. */
export function resolveDownloadUrl(video: Video, proxyUrl: string): string {
  if (video.clipStartSeconds === undefined && video.clipDurationSeconds === undefined) {
    return video.remoteUrl;
  }
  const params = [`url=${encodeURIComponent(video.remoteUrl)}`];
  if (video.clipStartSeconds !== undefined) params.push(`start=${video.clipStartSeconds}`);
  if (video.clipDurationSeconds !== undefined) params.push(`duration=${video.clipDurationSeconds}`);
  return `${proxyUrl}?${params.join('&')}`;
}

export async function hasNonEmptyFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile() && stat.size > 0;
  } catch (error: unknown) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

type ItemResult = { status: 'ok' } | { status: 'failed'; error: string } | { status: 'cancelled' };

export class DownloadOrchestrator {
  private readonly activeRuns = new Set<AbortController>();

  constructor(
    private readonly catalog: CatalogStore,
    private readonly downloader: MediaDownloader,
    private readonly options: DownloadOrchestratorOptions,
  ) {}

  /**
   * Fetch every video that is not downloaded yet. Safe to call at any time:
   * videos already marked downloaded cost no network call.
   */
  public syncDownloads(videos: Video[]): ProgressStream {
    return new ProgressStream((stream) => this.run(videos, stream));
  }

  /** Abort in-flight fetches. Partial `.tmp` files stay on disk for the next attempt. */
  public stop(): void {
    if (this.activeRuns.size > 0) {
      logger.info(`Cancelling ${this.activeRuns.size} download run(s)`);
    }
    for (const controller of this.activeRuns) {
      controller.abort();
    }
  }

  /** Remove media and partial files that belong to no catalog video. */
  public async pruneMediaDir(keepVideoIds: Iterable<string>): Promise<string[]> {
    const keep = new Set<string>();
    for (const id of keepVideoIds) {
      const base = path.basename(localPathFor(this.options.mediaDir, id));
      keep.add(base);
      keep.add(`${base}.tmp`);
    }

    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.options.mediaDir);
    } catch (error: unknown) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const removed: string[] = [];
    for (const name of entries) {
      if (!name.startsWith(FILE_PREFIX) || keep.has(name)) continue;
      try {
        await fs.promises.unlink(path.join(this.options.mediaDir, name));
        removed.push(name);
        logger.info(`Removing unused media file: ${name}`);
      } catch (error: unknown) {
        logger.warn(`Could not remove ${name}: ${errorMessage(error)}`);
      }
    }
    return removed;
  }

  private async run(videos: Video[], stream: ProgressStream): Promise<DownloadSummary> {
    const pending = videos.filter((v) => !v.downloaded);
    const summary: DownloadSummary = {
      total: pending.length,
      completed: 0,
      succeeded: [],
      failed: [],
      cancelled: false,
    };

    if (pending.length === 0) {
      logger.info('All videos are already downloaded');
      stream.emit('complete', summary);
      return summary;
    }

    const controller = new AbortController();
    this.activeRuns.add(controller);

    try {
      logger.info(`Starting downloads for ${pending.length} videos`);

      const guard = this.options.hasFreeSpace;
      if (guard && !(await guard(this.options.minFreeDiskBytes))) {
        const error = new StorageError(
          `Less than ${Math.round(this.options.minFreeDiskBytes / 1024 / 1024)}MB free in ${this.options.mediaDir}`,
        );
        logger.error(`Skipping downloads: ${error.message}`);
        for (const video of pending) {
          this.resolveItem(stream, summary, video.id, { status: 'failed', error: error.message });
        }
        stream.emit('complete', summary);
        return summary;
      }

      const limit = pLimit(this.options.concurrency);
      await Promise.all(
        pending.map((video) =>
          limit(async () => {
            const result = await this.downloadWithRetry(video, controller.signal);
            this.resolveItem(stream, summary, video.id, result);
          }),
        ),
      );

      if (controller.signal.aborted) {
        summary.cancelled = true;
        logger.warn(`Downloads cancelled after ${summary.completed}/${summary.total}`);
        return summary;
      }

      logger.info(
        `Downloads finished: ${summary.succeeded.length} succeeded, ${summary.failed.length} failed of ${summary.total}`,
      );
      stream.emit('complete', summary);
      return summary;
    } finally {
      this.activeRuns.delete(controller);
    }
  }

  private resolveItem(stream: ProgressStream, summary: DownloadSummary, videoId: string, result: ItemResult): void {
    if (result.status === 'cancelled') return;

    summary.completed++;
    if (result.status === 'ok') {
      summary.succeeded.push(videoId);
    } else {
      const failure: DownloadFailure = { videoId, error: result.error };
      summary.failed.push(failure);
      stream.emit('error', failure);
    }

    stream.emit('progress', {
      completed: summary.completed,
      total: summary.total,
      percent: Math.floor((summary.completed * 100) / summary.total),
    });
  }

  private async downloadWithRetry(video: Video, signal: AbortSignal): Promise<ItemResult> {
    if (signal.aborted) return { status: 'cancelled' };

    const dest = localPathFor(this.options.mediaDir, video.id);

    try {
      // A complete file from an earlier run that never got recorded
      if (await hasNonEmptyFile(dest)) {
        logger.info(`Video ${video.id} already on disk, skipping download`);
        await this.catalog.markDownloaded(video.id, dest);
        return { status: 'ok' };
      }
    } catch (error: unknown) {
      return { status: 'failed', error: errorMessage(error) };
    }

    const url = resolveDownloadUrl(video, this.options.proxyUrl);
    const attempts = this.options.maxRetries + 1;
    let lastError = 'unknown error';

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (signal.aborted) return { status: 'cancelled' };

      try {
        logger.info(`Downloading video ${video.id} (${video.name}), attempt ${attempt}/${attempts}`);
        const bytes = await this.downloader.download(url, dest, signal);
        if (signal.aborted) return { status: 'cancelled' };
        await this.catalog.markDownloaded(video.id, dest);
        logger.info(`✅ Downloaded video ${video.id} (${(bytes / 1024 / 1024).toFixed(1)} MB)`);
        return { status: 'ok' };
      } catch (error: unknown) {
        if (signal.aborted) return { status: 'cancelled' };
        lastError = errorMessage(error);
        logger.warn(`Download of video ${video.id} failed (attempt ${attempt}/${attempts}): ${lastError}`);
      }

      if (attempt < attempts) {
        // Exponential backoff: base, 2x base, 4x base, capped at 60s
        const wait = Math.min(this.options.retryDelayMs * Math.pow(2, attempt - 1), MAX_RETRY_DELAY_MS);
        await delay(wait, signal);
      }
    }

    logger.error(`Giving up on video ${video.id} after ${attempts} attempts: ${lastError}`);
    return { status: 'failed', error: lastError };
  }
}

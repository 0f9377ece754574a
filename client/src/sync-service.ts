import type {
  CatalogSnapshot,
  DownloadFailure,
  DownloadProgress,
  DownloadSummary,
} from '@adloop/shared';
import type { CatalogStore } from './catalog-store';
import { hasNonEmptyFile, type DownloadOrchestrator } from './download-orchestrator';
import { errorMessage } from './errors';
import { logger } from './logger';
import { parseManifest, type ParseOptions } from './manifest-parser';
import type { ContentSource } from './services/api';
import { EventEmitter } from './utils/event-emitter';

export type SyncReason = 'startup' | 'changelog' | 'manual';

export interface SyncResult {
  /** True when the manifest was applied and every pending video downloaded. */
  ok: boolean;
  reason: SyncReason;
  downloads: DownloadSummary;
}

export type SyncEvents = {
  progress: DownloadProgress;
  downloadError: DownloadFailure;
  ready: CatalogSnapshot;
};

/**
 * Manifest fetch, catalog reconciliation and downloads as one unit.
 *
 * Only one run is active at a time. A `sync` that arrives while a run is active
 * queues a single follow-up run that starts after it, so the manifest it reads
 * is never older than the trigger. Further triggers join that queued run.
 */
export class SyncService extends EventEmitter<SyncEvents> {
  private inFlight: Promise<SyncResult> | null = null;
  private queued: Promise<SyncResult> | null = null;
  private stopped = false;

  constructor(
    private readonly source: ContentSource,
    private readonly catalog: CatalogStore,
    private readonly downloads: DownloadOrchestrator,
    private readonly parseOptions: ParseOptions,
  ) {
    super();
  }

  /**
   * Pull the manifest and bring the catalog and media directory up to date.
   * Rejects with a TransportError or FormatError when the manifest cannot be
   * used; the previous catalog is then left as it was.
   */
  public sync(reason: SyncReason): Promise<SyncResult> {
    if (this.stopped) {
      return Promise.reject(new Error('Sync service is stopped'));
    }
    if (this.queued) {
      logger.info(`Sync already queued, ${reason} trigger joins it`);
      return this.queued;
    }

    const active = this.inFlight;
    if (active) {
      logger.info(`Sync in progress, ${reason} sync queued to run after it`);
      const queued = active
        .then(
          () => undefined,
          () => undefined,
        )
        .then(() => {
          this.queued = null;
          if (this.stopped) {
            throw new Error('Sync service is stopped');
          }
          return this.begin(() => this.runSync(reason));
        });
      this.queued = queued;
      return queued;
    }

    return this.begin(() => this.runSync(reason));
  }

  /** Fill download gaps in the stored catalog without contacting the manifest endpoint. */
  public resumeDownloads(): Promise<SyncResult> {
    const pending = this.queued ?? this.inFlight;
    if (pending) {
      return pending;
    }
    return this.begin(() => this.runDownloads('startup'));
  }

  /** Abort downloads, refuse new runs and wait for the active one to wind down. */
  public async stop(): Promise<void> {
    this.stopped = true;
    this.downloads.stop();

    let pending = this.queued ?? this.inFlight;
    while (pending) {
      try {
        await pending;
      } catch (error: unknown) {
        logger.debug(`Sync ended during shutdown: ${errorMessage(error)}`);
      }
      pending = this.queued ?? this.inFlight;
    }
  }

  private begin(run: () => Promise<SyncResult>): Promise<SyncResult> {
    const current: Promise<SyncResult> = run().finally(() => {
      if (this.inFlight === current) {
        this.inFlight = null;
      }
    });
    this.inFlight = current;
    return current;
  }

  private async runSync(reason: SyncReason): Promise<SyncResult> {
    logger.info(`Sync started (${reason})`);

    const document = await this.source.fetchManifest();
    const parsed = parseManifest(document, this.parseOptions);

    // The flat form lists playlists only; keep the video set we already have
    const videos = parsed.form === 'flat' ? this.catalog.getVideos() : parsed.videos;
    await this.catalog.merge(parsed.playlists, videos);

    return this.runDownloads(reason);
  }

  private async runDownloads(reason: SyncReason): Promise<SyncResult> {
    await this.catalog.invalidateMissingFiles(hasNonEmptyFile);

    if (this.stopped) {
      logger.info(`Sync stopped before downloads (${reason})`);
      return {
        ok: false,
        reason,
        downloads: { total: 0, completed: 0, succeeded: [], failed: [], cancelled: true },
      };
    }

    const stream = this.downloads.syncDownloads(this.catalog.getVideos());
    stream.on('progress', (progress) => {
      logger.info(`Download progress: ${progress.completed}/${progress.total} - ${progress.percent}%`);
      this.emit('progress', progress);
    });
    stream.on('error', (failure) => this.emit('downloadError', failure));

    const summary = await stream.done;

    if (!summary.cancelled) {
      try {
        await this.downloads.pruneMediaDir(this.catalog.getVideos().map((v) => v.id));
      } catch (error: unknown) {
        logger.warn(`Media cleanup failed: ${errorMessage(error)}`);
      }
      this.emit('ready', this.catalog.getSnapshot());
    }

    const ok = !summary.cancelled && summary.failed.length === 0;
    logger.info(`Sync finished (${reason}): ${ok ? 'complete' : 'incomplete'}`);
    return { ok, reason, downloads: summary };
  }
}

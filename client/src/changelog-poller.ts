import type { ChangelogEntry, ChangelogMarker, PollOutcome, PollerState } from '@adloop/shared';
import { errorMessage } from './errors';
import { logger } from './logger';
import type { ContentSource } from './services/api';
import type { ChangelogMarkerStore } from './store/device-state';
import type { SyncService } from './sync-service';

/** A stored marker is stale when the newest entry differs in id or creation time. */
export function hasChanged(marker: ChangelogMarker | null, entry: ChangelogEntry): boolean {
  if (!marker) return true;
  return marker.id !== entry.id || marker.dateCreated !== entry.dateCreated;
}

/**
 * Polls the changelog on a fixed interval and re-syncs only when it moved.
 *
 * The marker advances after a fully successful sync and never on failure, so
 * an outage or a half-finished download is retried on the next tick instead of
 * being mistaken for "no change".
 */
export class ChangelogPoller {
  private intervalId: NodeJS.Timeout | null = null;
  private state: PollerState = 'idle';

  constructor(
    private readonly source: ContentSource,
    private readonly markers: ChangelogMarkerStore,
    private readonly syncService: Pick<SyncService, 'sync'>,
    private readonly intervalMs: number,
  ) {}

  public start(): void {
    if (this.intervalId) {
      logger.warn('Changelog poller already running');
      return;
    }

    logger.info(`Starting changelog poller (interval: ${this.intervalMs}ms)`);
    this.intervalId = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
  }

  public stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      logger.info('Changelog poller stopped');
    }
  }

  public getState(): PollerState {
    return this.state;
  }

  public isRunning(): boolean {
    return this.intervalId !== null;
  }

  public async tick(): Promise<PollOutcome> {
    if (this.state !== 'idle') {
      logger.debug(`Skipping changelog check, poller is ${this.state}`);
      return { status: 'busy' };
    }

    this.state = 'polling';
    try {
      return await this.poll();
    } finally {
      this.state = 'idle';
    }
  }

  private async poll(): Promise<PollOutcome> {
    let entry: ChangelogEntry | null;
    let marker: ChangelogMarker | null;
    try {
      entry = await this.source.fetchLatestChangelog();
      marker = await this.markers.get();
    } catch (error: unknown) {
      const message = errorMessage(error);
      logger.warn(`Changelog check failed, will retry next tick: ${message}`);
      return { status: 'deferred', error: message };
    }

    if (!entry || !hasChanged(marker, entry)) {
      logger.debug(`No changes in changelog (marker: ${marker ? `#${marker.id}` : 'none'})`);
      return { status: 'no-change', entry };
    }

    logger.info(`🔄 Changelog moved to #${entry.id} (${entry.dateCreated}), syncing`);
    this.state = 'syncing';

    try {
      const result = await this.syncService.sync('changelog');
      if (!result.ok) {
        logger.warn(`Sync for changelog #${entry.id} incomplete, marker not advanced`);
        return { status: 'sync-failed', entry };
      }
      await this.markers.advance(entry);
      return { status: 'synced', entry };
    } catch (error: unknown) {
      const message = errorMessage(error);
      logger.error(`Sync for changelog #${entry.id} failed: ${message}`);
      return { status: 'sync-failed', entry, error: message };
    }
  }
}

import type { ActiveSequence, IdleReason } from '@adloop/shared';
import { errorMessage } from './errors';
import { logger } from './logger';
import type { PlaybackScheduler } from './playback-scheduler';
import type { DeviceInfoProvider } from './store/device-state';

/** The on-screen player. Implemented outside this package. */
export interface PlayerSink {
  play(sequence: ActiveSequence): void | Promise<void>;
  idle(reason: IdleReason): void | Promise<void>;
}

export class LoggingPlayerSink implements PlayerSink {
  public play(sequence: ActiveSequence): void {
    logger.info(
      `▶ Playlist ${sequence.playlistId}: ${sequence.files.length} files${sequence.skippedVideoIds.length ? `, ${sequence.skippedVideoIds.length} not ready` : ''}`,
    );
  }

  public idle(reason: IdleReason): void {
    logger.info(`⏸ Nothing to play (${reason})`);
  }
}

/**
 * Re-evaluates the schedule on a timer and whenever the catalog changes, and
 * hands the player a new sequence only when the selection actually differs.
 */
export class PlaybackController {
  private intervalId: NodeJS.Timeout | null = null;
  private lastKey: string | null = null;

  constructor(
    private readonly scheduler: PlaybackScheduler,
    private readonly deviceInfo: DeviceInfoProvider,
    private readonly sink: PlayerSink,
    private readonly intervalMs: number,
  ) {}

  public start(): void {
    if (this.intervalId) {
      logger.warn('Playback controller already running');
      return;
    }

    logger.info(`Starting playback controller (interval: ${this.intervalMs}ms)`);
    void this.evaluate();
    this.intervalId = setInterval(() => {
      void this.evaluate();
    }, this.intervalMs);
  }

  public stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      logger.info('Playback controller stopped');
    }
  }

  public async evaluate(now: Date = new Date()): Promise<ActiveSequence | null> {
    try {
      const device = await this.deviceInfo.getDeviceInfo();
      if (device && !device.active) {
        await this.notify('idle:device-inactive', () => this.sink.idle('device-inactive'));
        return null;
      }

      const sequence = this.scheduler.selectActive(now);
      if (!sequence) {
        await this.notify('idle:no-playlist', () => this.sink.idle('no-playlist'));
        return null;
      }

      const key = `play:${sequence.playlistId}:${sequence.files.join('|')}`;
      await this.notify(key, () => this.sink.play(sequence));
      return sequence;
    } catch (error: unknown) {
      logger.error(`Playback evaluation failed: ${errorMessage(error)}`);
      return null;
    }
  }

  private async notify(key: string, action: () => void | Promise<void>): Promise<void> {
    if (key === this.lastKey) return;
    await action();
    this.lastKey = key;
  }
}

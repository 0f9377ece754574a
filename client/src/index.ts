#!/usr/bin/env node

import * as path from 'path';
import { CatalogStore } from './catalog-store';
import { ChangelogPoller } from './changelog-poller';
import { ConfigManager, loadDotEnv, type ClientConfig } from './config';
import { DownloadOrchestrator } from './download-orchestrator';
import { errorMessage } from './errors';
import { HealthMonitor } from './health';
import { logger } from './logger';
import { LoggingPlayerSink, PlaybackController, type PlayerSink } from './playback-controller';
import { PlaybackScheduler } from './playback-scheduler';
import { ContentApi } from './services/api';
import { HttpMediaDownloader } from './services/media-downloader';
import { ChangelogMarkerStore, StoredDeviceInfoProvider } from './store/device-state';
import { FileKeyValueStore } from './store/key-value-store';
import { SyncService } from './sync-service';
import type { Disposable } from './utils/event-emitter';

/**
 * Owns every long-lived service of the player process. Created once at start-up
 * and torn down on shutdown.
 */
export class AdLoopClient {
  private isShuttingDown = false;
  private readySubscription: Disposable | null = null;

  public readonly catalog: CatalogStore;
  public readonly downloads: DownloadOrchestrator;
  public readonly syncService: SyncService;
  public readonly poller: ChangelogPoller;
  public readonly playback: PlaybackController;
  public readonly health: HealthMonitor;

  constructor(
    private readonly config: ClientConfig,
    sink: PlayerSink = new LoggingPlayerSink(),
  ) {
    const store = new FileKeyValueStore(path.join(config.dataDir, 'store'));
    const api = new ContentApi(config);

    this.health = new HealthMonitor(config.mediaDir, config.healthCheckInterval);
    this.catalog = new CatalogStore(store);
    this.downloads = new DownloadOrchestrator(this.catalog, new HttpMediaDownloader(config.downloadTimeout), {
      mediaDir: config.mediaDir,
      proxyUrl: config.proxyUrl,
      concurrency: config.downloadConcurrency,
      maxRetries: config.downloadMaxRetries,
      retryDelayMs: config.downloadRetryDelay,
      minFreeDiskBytes: config.minFreeDiskBytes,
      hasFreeSpace: (minBytes) => this.health.hasFreeSpace(minBytes),
    });
    this.syncService = new SyncService(api, this.catalog, this.downloads, {
      assetsBaseUrl: config.assetsBaseUrl,
      device:
        config.deviceId && config.deviceName
          ? { deviceId: config.deviceId, deviceName: config.deviceName }
          : undefined,
    });
    this.poller = new ChangelogPoller(api, new ChangelogMarkerStore(store), this.syncService, config.pollInterval);
    this.playback = new PlaybackController(
      new PlaybackScheduler(this.catalog),
      new StoredDeviceInfoProvider(store),
      sink,
      config.scheduleCheckInterval,
    );
  }

  public async start(): Promise<void> {
    logger.info('===========================================');
    logger.info('  Ad Loop Player Starting');
    logger.info('===========================================');
    logger.info(`Server URL: ${this.config.serverUrl}`);
    logger.info(`Media directory: ${this.config.mediaDir}`);
    logger.info(`Changelog poll interval: ${this.config.pollInterval}ms`);
    logger.info('===========================================');

    this.setupSignalHandlers();

    await this.catalog.load();

    // Play whatever is already on disk while the first sync runs
    this.readySubscription = this.syncService.on('ready', () => {
      void this.playback.evaluate();
    });
    this.playback.start();
    this.health.start();

    // First changelog check doubles as the initial sync
    const outcome = await this.poller.tick();
    if (outcome.status !== 'synced') {
      logger.info(`Start-up check ended with ${outcome.status}, resuming downloads from the stored catalog`);
      await this.syncService.resumeDownloads();
    }
    this.poller.start();

    logger.info('✅ Ad loop player started successfully');
  }

  public async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;

    logger.info('Shutting down ad loop player...');

    this.poller.stop();
    this.playback.stop();
    this.health.stop();
    this.readySubscription?.dispose();
    this.readySubscription = null;

    // Let the active sync wind down and the last catalog write land before exit
    await this.syncService.stop();
    await this.catalog.flush();

    logger.info('✅ Ad loop player shut down successfully');
  }

  private setupSignalHandlers(): void {
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT'];

    signals.forEach((signal) => {
      process.on(signal, () => {
        logger.info(`Received ${signal}, shutting down gracefully...`);
        void this.shutdown().then(() => process.exit(0));
      });
    });

    process.on('uncaughtException', (error) => {
      logger.error('Uncaught exception:', error.message);
      logger.error(error.stack || '');
    });

    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled rejection:', errorMessage(reason));
    });
  }
}

if (require.main === module) {
  loadDotEnv();
  const configManager = new ConfigManager();
  const config = configManager.get();
  logger.setLevel(config.logLevel);

  const client = new AdLoopClient(config);
  client.start().catch((error: unknown) => {
    logger.error('Fatal error:', errorMessage(error));
    process.exit(1);
  });
}

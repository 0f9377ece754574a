import * as dotenv from 'dotenv';
import * as os from 'os';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ClientConfig {
  // Server
  serverUrl: string;
  assetsBaseUrl: string;
  proxyUrl: string;

  // Device
  deviceId?: string;
  deviceName?: string;

  // Storage
  mediaDir: string;
  dataDir: string;
  minFreeDiskBytes: number;

  // Scheduling
  pollInterval: number;
  scheduleCheckInterval: number;
  healthCheckInterval: number;

  // Downloads
  downloadConcurrency: number;
  downloadMaxRetries: number;
  downloadRetryDelay: number;
  requestTimeout: number;
  downloadTimeout: number;

  // Logging
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Load `.env` from the working directory (not relative to __dirname, which
 * changes after compilation) so a service install can keep it beside the binary.
 */
export function loadDotEnv(cwd: string = process.cwd()): void {
  dotenv.config({ path: path.join(cwd, '.env') });
}

function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = (value || 'info').toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? 'info';
}

function trimSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

export class ConfigManager {
  private readonly config: ClientConfig;

  constructor(env: Env = process.env) {
    this.config = this.loadConfig(env);
    this.validateConfig();
  }

  private loadConfig(env: Env): ClientConfig {
    const homeDir = env.HOME || env.USERPROFILE || os.homedir() || '.';
    const dataDir = env.DATA_DIR || path.join(homeDir, '.adloop');
    const serverUrl = trimSlash(env.SERVER_URL || '');

    return {
      serverUrl,
      assetsBaseUrl: trimSlash(env.ASSETS_BASE_URL || `${serverUrl}/assets`),
      proxyUrl: `${serverUrl}/convert/proxy`,
      deviceId: env.DEVICE_ID || undefined,
      deviceName: env.DEVICE_NAME || undefined,
      mediaDir: env.MEDIA_DIR || path.join(dataDir, 'movies'),
      dataDir,
      minFreeDiskBytes: parseIntOr(env.MIN_FREE_DISK_MB, 500) * 1024 * 1024,
      // 30 minutes between changelog checks
      pollInterval: parseIntOr(env.POLL_INTERVAL, 30 * 60 * 1000),
      scheduleCheckInterval: parseIntOr(env.SCHEDULE_CHECK_INTERVAL, 30000),
      healthCheckInterval: parseIntOr(env.HEALTH_CHECK_INTERVAL, 60000),
      downloadConcurrency: parseIntOr(env.DOWNLOAD_CONCURRENCY, 2),
      downloadMaxRetries: parseIntOr(env.DOWNLOAD_MAX_RETRIES, 3),
      downloadRetryDelay: parseIntOr(env.DOWNLOAD_RETRY_DELAY, 2000),
      requestTimeout: parseIntOr(env.REQUEST_TIMEOUT, 30000),
      downloadTimeout: parseIntOr(env.DOWNLOAD_TIMEOUT, 300000),
      logLevel: parseLogLevel(env.LOG_LEVEL),
    };
  }

  private validateConfig(): void {
    const errors: string[] = [];

    if (!this.config.serverUrl) {
      errors.push('SERVER_URL is required');
    } else if (!/^https?:\/\//.test(this.config.serverUrl)) {
      errors.push('SERVER_URL must start with http:// or https://');
    }

    if (this.config.pollInterval < 1000) {
      errors.push('POLL_INTERVAL must be at least 1000ms');
    }

    if (this.config.scheduleCheckInterval < 1000) {
      errors.push('SCHEDULE_CHECK_INTERVAL must be at least 1000ms');
    }

    if (this.config.downloadConcurrency < 1) {
      errors.push('DOWNLOAD_CONCURRENCY must be at least 1');
    }

    if (this.config.downloadMaxRetries < 0) {
      errors.push('DOWNLOAD_MAX_RETRIES cannot be negative');
    }

    if ((this.config.deviceId === undefined) !== (this.config.deviceName === undefined)) {
      errors.push('DEVICE_ID and DEVICE_NAME must be set together');
    }

    if (errors.length > 0) {
      throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
    }
  }

  public get(): ClientConfig {
    return { ...this.config };
  }
}

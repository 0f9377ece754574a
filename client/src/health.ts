import * as path from 'path';
import * as si from 'systeminformation';
import type { DeviceHealthMetrics } from '@adloop/shared';
import { errorMessage } from './errors';
import { logger } from './logger';

/** Free bytes on the volume holding a directory; null when it cannot be determined. */
export async function getFreeBytes(dir: string): Promise<number | null> {
  const volumes = await si.fsSize();
  const target = path.resolve(dir);

  // Longest mount point that contains the directory
  let best: si.Systeminformation.FsSizeData | null = null;
  for (const volume of volumes) {
    const mount = volume.mount;
    if (!mount) continue;
    const inside = target === mount || target.startsWith(mount.endsWith(path.sep) ? mount : mount + path.sep);
    if (inside && (!best || mount.length > best.mount.length)) {
      best = volume;
    }
  }

  if (!best) return null;
  return best.available;
}

export class HealthMonitor {
  private intervalId: NodeJS.Timeout | null = null;
  private isRunning = false;

  constructor(
    private readonly mediaDir: string,
    private readonly intervalMs: number,
  ) {}

  public start(): void {
    if (this.isRunning) {
      logger.warn('Health monitor already running');
      return;
    }

    logger.info(`Starting health monitor (interval: ${this.intervalMs}ms)`);
    this.isRunning = true;

    void this.collectAndLog();

    this.intervalId = setInterval(() => {
      void this.collectAndLog();
    }, this.intervalMs);
  }

  public stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    if (this.isRunning) {
      this.isRunning = false;
      logger.info('Health monitor stopped');
    }
  }

  /** Storage guard for the download orchestrator. */
  public async hasFreeSpace(minBytes: number): Promise<boolean> {
    try {
      const free = await getFreeBytes(this.mediaDir);
      if (free === null) {
        logger.debug(`Could not determine free space for ${this.mediaDir}, assuming enough`);
        return true;
      }
      return free >= minBytes;
    } catch (error: unknown) {
      logger.warn(`Free space check failed, assuming enough: ${errorMessage(error)}`);
      return true;
    }
  }

  public async getHealthSnapshot(): Promise<DeviceHealthMetrics> {
    const [mem, currentLoad, disk, time, mediaFreeBytes] = await Promise.all([
      si.mem(),
      si.currentLoad(),
      si.fsSize(),
      si.time(),
      getFreeBytes(this.mediaDir),
    ]);

    // Disk usage of the first filesystem
    const diskUsage = disk.length > 0 ? disk[0].use : 0;

    return {
      cpuUsage: currentLoad.currentLoad,
      memoryUsage: (mem.used / mem.total) * 100,
      diskUsage,
      uptime: time.uptime,
      mediaFreeBytes,
      timestamp: new Date(),
    };
  }

  private async collectAndLog(): Promise<void> {
    try {
      const health = await this.getHealthSnapshot();
      const freeMb = health.mediaFreeBytes === null ? 'n/a' : `${Math.round(health.mediaFreeBytes / 1024 / 1024)}MB`;
      logger.info(
        `Health: cpu=${health.cpuUsage.toFixed(1)}% mem=${health.memoryUsage.toFixed(1)}% disk=${health.diskUsage.toFixed(1)}% mediaFree=${freeMb} uptime=${health.uptime}s`,
      );
    } catch (error: unknown) {
      logger.error('Failed to collect health metrics:', errorMessage(error));
    }
  }
}

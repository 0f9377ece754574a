import pLimit from 'p-limit';
import type { CatalogSnapshot, Playlist, Video } from '@adloop/shared';
import { errorMessage } from './errors';
import { logger } from './logger';
import { StoredCatalogSchema } from './schemas';
import type { KeyValueStore } from './store/key-value-store';

/** Playlists and videos are stored together so one write replaces both. */
export const CATALOG_KEY = 'catalog';

/** Returns true when a non-empty file exists at the path. */
export type LocalFileCheck = (localPath: string) => Promise<boolean>;

/**
 * Durable catalog of playlists and per-video download state.
 *
 * Every mutation rewrites the whole catalog document, so mutations run one at a
 * time behind a single writer lock. Readers get the last committed snapshot and
 * never wait on a writer. A failed write leaves both the stored document and the
 * snapshot as they were.
 */
export class CatalogStore {
  private readonly writeLock = pLimit(1);
  private snapshot: CatalogSnapshot = { playlists: [], videos: [] };

  constructor(private readonly store: KeyValueStore) {}

  public async load(): Promise<CatalogSnapshot> {
    this.snapshot = await this.readCatalog();
    logger.info(`Catalog loaded: ${this.snapshot.playlists.length} playlists, ${this.snapshot.videos.length} videos`);
    return this.getSnapshot();
  }

  /** Resolves once every write queued so far has been committed or has failed. */
  public flush(): Promise<void> {
    return this.writeLock(async () => undefined);
  }

  public getSnapshot(): CatalogSnapshot {
    return {
      playlists: this.snapshot.playlists.map((p) => ({ ...p, orderedVideoIds: [...p.orderedVideoIds] })),
      videos: this.snapshot.videos.map((v) => ({ ...v })),
    };
  }

  public getVideos(): Video[] {
    return this.getSnapshot().videos;
  }

  public getPlaylists(): Playlist[] {
    return this.getSnapshot().playlists;
  }

  public listUndownloaded(): Video[] {
    return this.getVideos().filter((v) => !v.downloaded);
  }

  /**
   * Replace playlists and videos with a freshly parsed set. Download state of a
   * video id present before and after carries over; ids that disappear are dropped.
   */
  public merge(newPlaylists: Playlist[], newVideos: Video[]): Promise<CatalogSnapshot> {
    return this.writeLock(async () => {
      const previous = new Map(this.snapshot.videos.map((v) => [v.id, v]));

      const videos = newVideos.map((video): Video => {
        const existing = previous.get(video.id);
        if (existing && existing.downloaded && existing.localPath) {
          return { ...video, downloaded: true, localPath: existing.localPath };
        }
        return { ...video, downloaded: false, localPath: existing?.localPath ?? null };
      });
      const playlists = newPlaylists.map((p) => ({ ...p, orderedVideoIds: [...p.orderedVideoIds] }));

      await this.commit({ playlists, videos });

      const kept = videos.filter((v) => previous.has(v.id)).length;
      logger.info(
        `Catalog merged: ${playlists.length} playlists, ${videos.length} videos (${kept} carried over, ${previous.size - kept} dropped)`,
      );
      return this.getSnapshot();
    });
  }

  /** The only path that sets `downloaded = true`. */
  public markDownloaded(id: string, localPath: string): Promise<boolean> {
    return this.writeLock(async () => {
      const index = this.snapshot.videos.findIndex((v) => v.id === id);
      if (index === -1) {
        logger.warn(`Video ${id} not found in catalog, ignoring download result`);
        return false;
      }

      const videos = this.snapshot.videos.map((v, i) =>
        i === index ? { ...v, downloaded: true, localPath } : v,
      );
      await this.commit({ playlists: this.snapshot.playlists, videos });
      logger.debug(`Video ${id} marked downloaded at ${localPath}`);
      return true;
    });
  }

  /** Reset download state for records whose file has gone missing or is empty. */
  public invalidateMissingFiles(check: LocalFileCheck): Promise<string[]> {
    return this.writeLock(async () => {
      const reset: string[] = [];
      const videos: Video[] = [];

      for (const video of this.snapshot.videos) {
        if (video.downloaded && (!video.localPath || !(await check(video.localPath)))) {
          reset.push(video.id);
          videos.push({ ...video, downloaded: false });
        } else {
          videos.push(video);
        }
      }

      if (reset.length > 0) {
        logger.warn(`Local files missing for ${reset.length} videos, will download again: ${reset.join(', ')}`);
        await this.commit({ playlists: this.snapshot.playlists, videos });
      }
      return reset;
    });
  }

  private async commit(next: CatalogSnapshot): Promise<void> {
    await this.store.set(CATALOG_KEY, JSON.stringify(next));
    this.snapshot = next;
  }

  private async readCatalog(): Promise<CatalogSnapshot> {
    const raw = await this.store.get(CATALOG_KEY);
    if (raw === null) {
      logger.debug('No catalog stored yet');
      return { playlists: [], videos: [] };
    }

    try {
      const parsed = StoredCatalogSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
      logger.error(`Stored catalog has an unexpected shape, clearing: ${parsed.error.issues[0]?.message}`);
    } catch (error: unknown) {
      logger.error(`Stored catalog is not valid JSON, clearing: ${errorMessage(error)}`);
    }

    await this.store.delete(CATALOG_KEY);
    return { playlists: [], videos: [] };
  }
}

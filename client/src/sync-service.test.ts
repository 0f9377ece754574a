import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import type { CatalogSnapshot, ChangelogEntry, DownloadProgress } from '@adloop/shared';
import { CatalogStore } from './catalog-store';
import { ChangelogPoller } from './changelog-poller';
import { DownloadOrchestrator, localPathFor } from './download-orchestrator';
import { FormatError } from './errors';
import type { ContentSource } from './services/api';
import { ChangelogMarkerStore } from './store/device-state';
import { MemoryKeyValueStore } from './store/key-value-store';
import { SyncService } from './sync-service';

function manifest(...videoIds: string[]) {
  return {
    data: [
      {
        id: 1,
        beginTime: '08:00:00',
        endTime: '12:00:00',
        assets: videoIds.map((id) => ({
          media_assets_id: { title: `Video ${id}`, file: { id, filename_disk: `${id}.mp4` } },
        })),
      },
    ],
  };
}

/** A promise whose resolution the test controls. */
function gate(): { wait: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}

describe('SyncService', () => {
  let mediaDir: string;
  let catalog: CatalogStore;
  let fetchManifest: Mock<[], Promise<unknown>>;
  let download: Mock<[string, string, AbortSignal], Promise<number>>;
  let service: SyncService;

  beforeEach(() => {
    mediaDir = fs.mkdtempSync(path.join(os.tmpdir(), 'adloop-sync-'));
    catalog = new CatalogStore(new MemoryKeyValueStore());
    fetchManifest = vi.fn<[], Promise<unknown>>(async () => manifest('a', 'b'));
    download = vi.fn<[string, string, AbortSignal], Promise<number>>(async (_url, dest) => {
      await fs.promises.writeFile(dest, 'video-bytes');
      return 11;
    });

    const source: ContentSource = {
      fetchManifest,
      fetchLatestChangelog: vi.fn(async () => null),
    };
    const downloads = new DownloadOrchestrator(
      catalog,
      { download },
      {
        mediaDir,
        proxyUrl: 'https://cms.test/convert/proxy',
        concurrency: 2,
        maxRetries: 0,
        retryDelayMs: 0,
        minFreeDiskBytes: 0,
      },
    );
    service = new SyncService(source, catalog, downloads, { assetsBaseUrl: 'https://cms.test/assets' });
  });

  afterEach(() => {
    fs.rmSync(mediaDir, { recursive: true, force: true });
  });

  it('applies the manifest and downloads every video', async () => {
    const ready: CatalogSnapshot[] = [];
    const progress: DownloadProgress[] = [];
    service.on('ready', (snapshot) => ready.push(snapshot));
    service.on('progress', (p) => progress.push(p));

    const result = await service.sync('startup');

    expect(result.ok).toBe(true);
    expect(result.reason).toBe('startup');
    expect(result.downloads.succeeded.sort()).toEqual(['a', 'b']);
    expect(download).toHaveBeenCalledTimes(2);
    expect(progress.map((p) => p.completed)).toEqual([1, 2]);
    expect(ready).toHaveLength(1);
    expect(ready[0].playlists.map((p) => p.orderedVideoIds)).toEqual([['a', 'b']]);
    expect(catalog.listUndownloaded()).toEqual([]);
    expect(catalog.getVideos()[0].localPath).toBe(localPathFor(mediaDir, 'a'));
  });

  it('queues one follow-up sync for triggers that arrive during a run', async () => {
    const manifestGate = gate();
    fetchManifest.mockImplementationOnce(async () => {
      await manifestGate.wait;
      return manifest('a', 'b');
    });

    const first = service.sync('startup');
    const second = service.sync('changelog');
    const third = service.sync('manual');

    expect(second).not.toBe(first);
    expect(third).toBe(second);
    expect(fetchManifest).toHaveBeenCalledTimes(1);

    manifestGate.open();

    expect((await first).reason).toBe('startup');
    expect((await second).reason).toBe('changelog');
    expect(fetchManifest).toHaveBeenCalledTimes(2);
  });

  it('fetches the manifest for a changelog move seen while resuming downloads', async () => {
    await catalog.merge(
      [{ id: '1', startTime: '08:00', endTime: '12:00', active: true, orderedVideoIds: ['a'] }],
      [{ id: 'a', name: 'Video a', remoteUrl: 'https://cms.test/assets/a.mp4', localPath: null, downloaded: false }],
    );
    const downloadGate = gate();
    download.mockImplementationOnce(async (_url, dest) => {
      await downloadGate.wait;
      await fs.promises.writeFile(dest, 'video-bytes');
      return 11;
    });
    const latest: ChangelogEntry = { id: 23, dateCreated: '2024-06-03T10:00:00Z', dateUpdated: null, log: 'new ads' };
    const markers = new ChangelogMarkerStore(new MemoryKeyValueStore());
    const poller = new ChangelogPoller({ fetchManifest, fetchLatestChangelog: async () => latest }, markers, service, 60000);

    const resumed = service.resumeDownloads();
    await vi.waitFor(() => expect(download).toHaveBeenCalledTimes(1));
    const tick = poller.tick();
    await vi.waitFor(() => expect(poller.getState()).toBe('syncing'));

    expect(fetchManifest).not.toHaveBeenCalled();
    expect(await markers.get()).toBeNull();

    downloadGate.open();

    expect(await tick).toEqual({ status: 'synced', entry: latest });
    expect(fetchManifest).toHaveBeenCalledTimes(1);
    expect((await resumed).reason).toBe('startup');
    expect(await markers.get()).toEqual({ id: 23, dateCreated: '2024-06-03T10:00:00Z' });
    expect(catalog.getPlaylists().map((p) => p.orderedVideoIds)).toEqual([['a', 'b']]);
  });

  it('joins a pending run when asked to resume downloads', async () => {
    const manifestGate = gate();
    fetchManifest.mockImplementationOnce(async () => {
      await manifestGate.wait;
      return manifest('a');
    });

    const running = service.sync('changelog');
    const resumed = service.resumeDownloads();
    manifestGate.open();

    expect(resumed).toBe(running);
    expect((await resumed).reason).toBe('changelog');
  });

  it('waits for the active run on stop and refuses later syncs', async () => {
    const downloadGate = gate();
    download.mockImplementation(async (_url, dest) => {
      await downloadGate.wait;
      await fs.promises.writeFile(dest, 'video-bytes');
      return 11;
    });
    const running = service.sync('startup');
    const queued = service.sync('changelog');
    await vi.waitFor(() => expect(download).toHaveBeenCalled());

    const stopping = service.stop();
    downloadGate.open();
    await stopping;

    expect(await running).toMatchObject({ ok: false, downloads: { cancelled: true } });
    await expect(queued).rejects.toThrow('Sync service is stopped');
    await expect(service.sync('manual')).rejects.toThrow('Sync service is stopped');
    expect(fetchManifest).toHaveBeenCalledTimes(1);
    expect(catalog.listUndownloaded().map((v) => v.id)).toEqual(['a', 'b']);
  });

  it('rejects an unrecognized manifest and keeps the previous catalog', async () => {
    await service.sync('startup');
    const before = catalog.getSnapshot();
    fetchManifest.mockResolvedValueOnce({ unexpected: true });

    await expect(service.sync('changelog')).rejects.toBeInstanceOf(FormatError);

    expect(catalog.getSnapshot()).toEqual(before);
    await expect(service.sync('manual')).resolves.toMatchObject({ ok: true, reason: 'manual' });
  });

  it('keeps the stored videos when the manifest is the flat form', async () => {
    await service.sync('startup');
    fetchManifest.mockResolvedValueOnce([{ id: 9, startTime: '22:00', endTime: '06:00', videoIds: ['b'] }]);

    const result = await service.sync('changelog');

    expect(result.ok).toBe(true);
    expect(catalog.getPlaylists()).toEqual([
      { id: '9', startTime: '22:00', endTime: '06:00', active: true, orderedVideoIds: ['b'] },
    ]);
    expect(catalog.getVideos().map((v) => [v.id, v.downloaded])).toEqual([
      ['a', true],
      ['b', true],
    ]);
    expect(download).toHaveBeenCalledTimes(2);
  });

  it('reports a failed download as an incomplete sync', async () => {
    download.mockImplementation(async (url, dest) => {
      if (url.endsWith('/b.mp4')) throw new Error('HTTP 500');
      await fs.promises.writeFile(dest, 'video-bytes');
      return 11;
    });
    const failures: string[] = [];
    service.on('downloadError', (failure) => failures.push(failure.videoId));

    const result = await service.sync('changelog');

    expect(result.ok).toBe(false);
    expect(result.downloads.failed).toEqual([{ videoId: 'b', error: 'HTTP 500' }]);
    expect(failures).toEqual(['b']);
    expect(catalog.listUndownloaded().map((v) => v.id)).toEqual(['b']);
  });

  it('downloads again when a recorded file has gone missing', async () => {
    await service.sync('startup');
    fs.unlinkSync(localPathFor(mediaDir, 'a'));

    const result = await service.resumeDownloads();

    expect(result.ok).toBe(true);
    expect(result.downloads.succeeded).toEqual(['a']);
    expect(download).toHaveBeenCalledTimes(3);
  });

  it('removes media files for videos no longer in the manifest', async () => {
    fs.writeFileSync(path.join(mediaDir, 'video_old.mp4'), 'stale');

    await service.sync('startup');

    expect(fs.readdirSync(mediaDir).sort()).toEqual(['video_a.mp4', 'video_b.mp4']);
  });
});

import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import type { ChangelogEntry } from '@adloop/shared';
import { ChangelogPoller, hasChanged } from './changelog-poller';
import { TransportError } from './errors';
import type { ContentSource } from './services/api';
import { ChangelogMarkerStore, DEVICE_STATE_KEYS } from './store/device-state';
import { MemoryKeyValueStore } from './store/key-value-store';
import type { SyncReason, SyncResult } from './sync-service';

function entry(id: number, dateCreated = `2024-06-0${id % 10}T10:00:00Z`): ChangelogEntry {
  return { id, dateCreated, dateUpdated: null, log: `change ${id}` };
}

function syncResult(ok: boolean): SyncResult {
  return {
    ok,
    reason: 'changelog',
    downloads: { total: 0, completed: 0, succeeded: [], failed: [], cancelled: false },
  };
}

describe('hasChanged', () => {
  it('treats a missing marker as changed', () => {
    expect(hasChanged(null, entry(1))).toBe(true);
  });

  it('compares id and creation time', () => {
    const current = entry(22, '2024-06-01T10:00:00Z');
    expect(hasChanged({ id: 22, dateCreated: '2024-06-01T10:00:00Z' }, current)).toBe(false);
    expect(hasChanged({ id: 21, dateCreated: '2024-06-01T10:00:00Z' }, current)).toBe(true);
    expect(hasChanged({ id: 22, dateCreated: '2024-05-31T10:00:00Z' }, current)).toBe(true);
  });
});

describe('ChangelogPoller', () => {
  let store: MemoryKeyValueStore;
  let markers: ChangelogMarkerStore;
  let latest: ChangelogEntry | null;
  let source: ContentSource;
  let sync: Mock<[SyncReason], Promise<SyncResult>>;
  let poller: ChangelogPoller;

  beforeEach(() => {
    store = new MemoryKeyValueStore();
    markers = new ChangelogMarkerStore(store);
    latest = null;
    source = {
      fetchManifest: vi.fn(async () => []),
      fetchLatestChangelog: vi.fn(async () => latest),
    };
    sync = vi.fn<[SyncReason], Promise<SyncResult>>(async () => syncResult(true));
    poller = new ChangelogPoller(source, markers, { sync }, 60000);
  });

  it('syncs once when the changelog moves and not again until it moves further', async () => {
    latest = entry(22);
    expect(await poller.tick()).toEqual({ status: 'synced', entry: entry(22) });
    expect(await markers.get()).toEqual({ id: 22, dateCreated: entry(22).dateCreated });

    expect(await poller.tick()).toEqual({ status: 'no-change', entry: entry(22) });
    expect(sync).toHaveBeenCalledTimes(1);
    expect(await markers.get()).toEqual({ id: 22, dateCreated: entry(22).dateCreated });

    latest = entry(23);
    expect(await poller.tick()).toEqual({ status: 'synced', entry: entry(23) });
    expect(sync).toHaveBeenCalledTimes(2);
    expect(sync).toHaveBeenLastCalledWith('changelog');
    expect((await markers.get())?.id).toBe(23);
  });

  it('reports no change when the changelog is empty', async () => {
    expect(await poller.tick()).toEqual({ status: 'no-change', entry: null });
    expect(sync).not.toHaveBeenCalled();
  });

  it('defers when the changelog cannot be fetched', async () => {
    await markers.advance(entry(22));
    vi.mocked(source.fetchLatestChangelog).mockRejectedValueOnce(new TransportError('HTTP 503 Service Unavailable: ', 503));

    expect(await poller.tick()).toEqual({ status: 'deferred', error: 'HTTP 503 Service Unavailable: ' });
    expect(sync).not.toHaveBeenCalled();
    expect((await markers.get())?.id).toBe(22);
    expect(poller.getState()).toBe('idle');
  });

  it('keeps the marker when the sync is incomplete', async () => {
    latest = entry(5);
    sync.mockResolvedValueOnce(syncResult(false));

    expect(await poller.tick()).toEqual({ status: 'sync-failed', entry: entry(5) });
    expect(await markers.get()).toBeNull();

    expect(await poller.tick()).toEqual({ status: 'synced', entry: entry(5) });
    expect(sync).toHaveBeenCalledTimes(2);
  });

  it('keeps the marker when the sync throws', async () => {
    latest = entry(5);
    sync.mockRejectedValueOnce(new Error('manifest unreachable'));

    expect(await poller.tick()).toEqual({ status: 'sync-failed', entry: entry(5), error: 'manifest unreachable' });
    expect(await store.get(DEVICE_STATE_KEYS.CHANGELOG_MARKER)).toBeNull();
  });

  it('skips a tick while a check is already running', async () => {
    latest = entry(1);
    let finish: (result: SyncResult) => void = () => undefined;
    sync.mockImplementationOnce(
      () =>
        new Promise<SyncResult>((resolve) => {
          finish = resolve;
        }),
    );

    const first = poller.tick();
    await vi.waitFor(() => expect(sync).toHaveBeenCalledTimes(1));
    expect(poller.getState()).toBe('syncing');

    expect(await poller.tick()).toEqual({ status: 'busy' });

    finish(syncResult(true));
    expect(await first).toEqual({ status: 'synced', entry: entry(1) });
    expect(poller.getState()).toBe('idle');
  });

  it('reports whether its timer is running', () => {
    expect(poller.isRunning()).toBe(false);
    poller.start();
    expect(poller.isRunning()).toBe(true);
    poller.stop();
    expect(poller.isRunning()).toBe(false);
    expect(sync).not.toHaveBeenCalled();
  });
});

import type { ChangelogEntry, ChangelogMarker, DeviceInfo } from '@adloop/shared';
import { logger } from '../logger';
import { ChangelogMarkerSchema, DeviceInfoSchema } from '../schemas';
import type { KeyValueStore } from './key-value-store';

export const DEVICE_STATE_KEYS = {
  CHANGELOG_MARKER: 'changelog_marker',
  DEVICE_INFO: 'device_info',
} as const;

async function readJson(store: KeyValueStore, key: string): Promise<unknown> {
  const raw = await store.get(key);
  if (raw === null) return null;
  try {
    return JSON.parse(raw);
  } catch {
    logger.error(`Stored ${key} is not valid JSON, ignoring`);
    return null;
  }
}

/** Last changelog entry a full sync succeeded for. */
export class ChangelogMarkerStore {
  constructor(private readonly store: KeyValueStore) {}

  public async get(): Promise<ChangelogMarker | null> {
    const value = await readJson(this.store, DEVICE_STATE_KEYS.CHANGELOG_MARKER);
    if (value === null) return null;
    const parsed = ChangelogMarkerSchema.safeParse(value);
    return parsed.success ? parsed.data : null;
  }

  public async advance(entry: ChangelogEntry): Promise<void> {
    const marker: ChangelogMarker = { id: entry.id, dateCreated: entry.dateCreated };
    await this.store.set(DEVICE_STATE_KEYS.CHANGELOG_MARKER, JSON.stringify(marker));
    logger.info(`Changelog marker advanced to #${marker.id} (${marker.dateCreated})`);
  }
}

export interface DeviceInfoProvider {
  getDeviceInfo(): Promise<DeviceInfo | null>;
}

/** Reads the record the device registration collaborator keeps in the store. */
export class StoredDeviceInfoProvider implements DeviceInfoProvider {
  constructor(private readonly store: KeyValueStore) {}

  public async getDeviceInfo(): Promise<DeviceInfo | null> {
    const value = await readJson(this.store, DEVICE_STATE_KEYS.DEVICE_INFO);
    if (value === null) return null;
    const parsed = DeviceInfoSchema.safeParse(value);
    if (!parsed.success) {
      logger.warn(`Stored device info has an unexpected shape: ${parsed.error.issues[0]?.message}`);
      return null;
    }
    return parsed.data;
  }
}

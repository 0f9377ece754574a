import type { Playlist, Video } from '@adloop/shared';
import { FormatError } from './errors';
import { logger } from './logger';
import {
  EnvelopedManifestSchema,
  EnvelopedPlaylistEntrySchema,
  FlatManifestSchema,
  FlatPlaylistEntrySchema,
  PlaylistAssetSchema,
  type EnvelopedPlaylistEntry,
} from './schemas';

export type ManifestForm = 'flat' | 'enveloped';

export interface ParsedManifest {
  form: ManifestForm;
  playlists: Playlist[];
  /** Empty for the flat form, which carries no asset descriptors. */
  videos: Video[];
}

export interface ParseOptions {
  /** Used when an asset has no `fileUrl` of its own. */
  assetsBaseUrl: string;
  /** Keep only playlists addressed to this device (or to no device). */
  device?: { deviceId: string; deviceName: string };
}

const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)(:[0-5]\d)?$/;

/** `HH:MM:SS` or `HH:MM` to `HH:MM`; null when the value is not a time of day. */
export function toMinuteTime(value: string): string | null {
  const trimmed = value.trim();
  if (!TIME_OF_DAY.test(trimmed)) return null;
  return trimmed.substring(0, 5);
}

/** Join a base URL and a file name with exactly one slash. */
export function joinUrl(base: string, fileName: string): string {
  return `${base.replace(/\/+$/, '')}/${fileName.replace(/^\/+/, '')}`;
}

export function parseManifest(document: unknown, options: ParseOptions): ParsedManifest {
  const flat = FlatManifestSchema.safeParse(document);
  if (flat.success) {
    return { form: 'flat', playlists: parseFlat(flat.data), videos: [] };
  }

  const enveloped = EnvelopedManifestSchema.safeParse(document);
  if (enveloped.success) {
    return { form: 'enveloped', ...parseEnveloped(enveloped.data.data, options) };
  }

  throw new FormatError('Manifest is neither a playlist array nor a {data: [...]} envelope');
}

function parseFlat(entries: unknown[]): Playlist[] {
  const playlists: Playlist[] = [];

  entries.forEach((raw, index) => {
    const result = FlatPlaylistEntrySchema.safeParse(raw);
    if (!result.success) {
      logger.warn(`Skipping malformed playlist entry #${index}: ${result.error.issues[0]?.message}`);
      return;
    }

    const entry = result.data;
    const startTime = toMinuteTime(entry.startTime);
    const endTime = toMinuteTime(entry.endTime);
    if (!startTime || !endTime) {
      logger.warn(`Skipping playlist ${entry.id}: invalid time window ${entry.startTime}-${entry.endTime}`);
      return;
    }

    playlists.push({
      id: String(entry.id),
      startTime,
      endTime,
      active: entry.active ?? true,
      order: entry.order ?? undefined,
      orderedVideoIds: entry.videoIds.map(String),
    });
  });

  return playlists;
}

/** Unaddressed playlists are shared by every device; addressed ones need both id and name to match. */
function matchesDevice(entry: EnvelopedPlaylistEntry, device: ParseOptions['device']): boolean {
  if (!device || !entry.device) return true;
  const { device_id: deviceId, device_name: deviceName } = entry.device;
  if (!deviceId && !deviceName) return true;
  return deviceId === device.deviceId && deviceName === device.deviceName;
}

function parseEnveloped(entries: unknown[], options: ParseOptions): Omit<ParsedManifest, 'form'> {
  const playlists: Playlist[] = [];
  const videos: Video[] = [];
  const seenVideoIds = new Set<string>();

  entries.forEach((raw, index) => {
    const result = EnvelopedPlaylistEntrySchema.safeParse(raw);
    if (!result.success) {
      logger.warn(`Skipping malformed playlist entry #${index}: ${result.error.issues[0]?.message}`);
      return;
    }

    const entry = result.data;
    const playlistId = String(entry.id);

    if (!matchesDevice(entry, options.device)) {
      logger.debug(`Skipping playlist ${playlistId}: addressed to another device`);
      return;
    }

    const startTime = toMinuteTime(entry.beginTime);
    const endTime = toMinuteTime(entry.endTime);
    if (!startTime || !endTime) {
      logger.warn(`Skipping playlist ${playlistId}: invalid time window ${entry.beginTime}-${entry.endTime}`);
      return;
    }

    const orderedVideoIds: string[] = [];
    (entry.assets ?? []).forEach((rawAsset, assetIndex) => {
      const asset = PlaylistAssetSchema.safeParse(rawAsset);
      if (!asset.success) {
        logger.warn(`Skipping malformed asset #${assetIndex} in playlist ${playlistId}`);
        return;
      }

      const media = asset.data.media_assets_id;
      const videoId = String(media.file.id);
      orderedVideoIds.push(videoId);

      if (seenVideoIds.has(videoId)) return;
      seenVideoIds.add(videoId);

      videos.push({
        id: videoId,
        name: media.title?.trim() || 'Untitled Video',
        remoteUrl: joinUrl(media.fileUrl || options.assetsBaseUrl, media.file.filename_disk),
        localPath: null,
        downloaded: false,
        order: asset.data.order ?? undefined,
        clipStartSeconds: media.startTime ?? undefined,
        clipDurationSeconds: media.duration ?? undefined,
      });
    });

    playlists.push({
      id: playlistId,
      title: entry.title ?? undefined,
      startTime,
      endTime,
      active: entry.active ?? true,
      order: entry.order ?? undefined,
      portrait: entry.portrait ?? undefined,
      deviceId: entry.device?.device_id ?? undefined,
      deviceName: entry.device?.device_name ?? undefined,
      orderedVideoIds,
    });

    logger.debug(`Parsed playlist ${playlistId}: ${startTime}-${endTime}, ${orderedVideoIds.length} videos`);
  });

  logger.info(`Parsed ${playlists.length} playlists and ${videos.length} videos from manifest`);
  return { playlists, videos };
}

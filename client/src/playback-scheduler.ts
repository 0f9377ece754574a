import type { ActiveSequence, CatalogSnapshot, Playlist, Video } from '@adloop/shared';
import { IntegrityError } from './errors';
import { logger } from './logger';

export interface TimeWindow {
  startTime: string;
  endTime: string;
}

export interface CatalogReader {
  getSnapshot(): CatalogSnapshot;
}

const MINUTES_PER_DAY = 24 * 60;

/** Minutes since midnight for an `HH:MM` string, or null if it is not one. */
export function parseTimeOfDay(value: string): number | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return hours * 60 + minutes;
}

export function minuteOfDay(date: Date): number {
  return date.getHours() * 60 + date.getMinutes();
}

/**
 * Membership of `now` (minutes since midnight) in `[start, end)`.
 * A window with `start > end` wraps past midnight; `start == end` never matches.
 */
export function isWithinWindow(window: TimeWindow, now: number): boolean {
  const start = parseTimeOfDay(window.startTime);
  const end = parseTimeOfDay(window.endTime);
  if (start === null || end === null) return false;

  const minute = ((now % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;

  if (start < end) {
    return start <= minute && minute < end;
  }
  if (start > end) {
    return minute >= start || minute < end;
  }
  return false;
}

/** Lowest `order` first (missing order last), then id ascending with numeric-aware comparison. */
export function comparePlaylistPriority(a: Playlist, b: Playlist): number {
  const orderA = a.order ?? Number.POSITIVE_INFINITY;
  const orderB = b.order ?? Number.POSITIVE_INFINITY;
  if (orderA !== orderB) {
    return orderA < orderB ? -1 : 1;
  }
  return a.id.localeCompare(b.id, 'en', { numeric: true });
}

export function pickActivePlaylist(playlists: Playlist[], now: Date): Playlist | null {
  const minute = minuteOfDay(now);
  const candidates = playlists.filter((p) => p.active && isWithinWindow(p, minute));
  if (candidates.length === 0) return null;
  return [...candidates].sort(comparePlaylistPriority)[0];
}

/** Resolve a playlist's video ids to playable local files, skipping what is not ready. */
export function resolveSequence(playlist: Playlist, videosById: Map<string, Video>): ActiveSequence {
  const files: string[] = [];
  const skippedVideoIds: string[] = [];

  for (const videoId of playlist.orderedVideoIds) {
    const video = videosById.get(videoId);
    if (!video) {
      const error = new IntegrityError(playlist.id, videoId);
      logger.warn(error.message);
      skippedVideoIds.push(videoId);
      continue;
    }
    if (!video.downloaded || !video.localPath) {
      logger.debug(`Video ${videoId} in playlist ${playlist.id} is not downloaded yet, skipping`);
      skippedVideoIds.push(videoId);
      continue;
    }
    files.push(video.localPath);
  }

  return {
    playlistId: playlist.id,
    portrait: playlist.portrait ?? false,
    files,
    skippedVideoIds,
  };
}

export class PlaybackScheduler {
  constructor(private readonly catalog: CatalogReader) {}

  /** The sequence to play at `now`, or null when no active playlist covers it. */
  public selectActive(now: Date = new Date()): ActiveSequence | null {
    const snapshot = this.catalog.getSnapshot();
    const playlist = pickActivePlaylist(snapshot.playlists, now);
    if (!playlist) {
      return null;
    }

    const videosById = new Map(snapshot.videos.map((v) => [v.id, v]));
    return resolveSequence(playlist, videosById);
  }
}

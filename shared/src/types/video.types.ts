import type { Playlist } from './playlist.types';

export interface Video {
  id: string;
  name: string;
  remoteUrl: string;
  localPath: string | null;
  downloaded: boolean;
  order?: number;
  clipStartSeconds?: number; // trimmed clips are fetched through the media proxy
  clipDurationSeconds?: number;
}

export interface CatalogSnapshot {
  playlists: Playlist[];
  videos: Video[];
}

export interface Playlist {
  id: string;
  title?: string;
  startTime: string; // HH:MM, local time of day
  endTime: string; // HH:MM; earlier than startTime means the window spans midnight
  active: boolean;
  order?: number; // lower wins when several playlists cover "now"
  portrait?: boolean;
  deviceId?: string;
  deviceName?: string;
  orderedVideoIds: string[];
}

export interface ActiveSequence {
  playlistId: string;
  portrait: boolean;
  files: string[]; // local paths, in playlist order
  skippedVideoIds: string[];
}

export type IdleReason = 'no-playlist' | 'device-inactive';

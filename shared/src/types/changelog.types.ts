export interface ChangelogEntry {
  id: number;
  dateCreated: string;
  dateUpdated: string | null;
  log: string;
}

export interface ChangelogMarker {
  id: number;
  dateCreated: string;
}

export type PollerState = 'idle' | 'polling' | 'syncing';

export type PollOutcome =
  | { status: 'no-change'; entry: ChangelogEntry | null }
  | { status: 'synced'; entry: ChangelogEntry }
  | { status: 'sync-failed'; entry: ChangelogEntry; error?: string }
  | { status: 'deferred'; error: string }
  | { status: 'busy' };

export type AdLoopErrorCode = 'FORMAT_ERROR' | 'TRANSPORT_ERROR' | 'INTEGRITY_ERROR' | 'STORAGE_ERROR';

export abstract class AdLoopError extends Error {
  public abstract readonly code: AdLoopErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Manifest, changelog or stored record does not have a recognized shape. */
export class FormatError extends AdLoopError {
  public readonly code = 'FORMAT_ERROR';
}

/** A network request failed, timed out or returned a non-2xx status. */
export class TransportError extends AdLoopError {
  public readonly code = 'TRANSPORT_ERROR';

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A playlist references a video id the catalog does not know. */
export class IntegrityError extends AdLoopError {
  public readonly code = 'INTEGRITY_ERROR';

  constructor(
    public readonly playlistId: string,
    public readonly videoId: string,
  ) {
    super(`Playlist ${playlistId} references unknown video ${videoId}`);
  }
}

/** The media volume has too little free space to download into. */
export class StorageError extends AdLoopError {
  public readonly code = 'STORAGE_ERROR';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

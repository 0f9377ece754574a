import * as fs from 'fs';
import * as path from 'path';
import pLimit from 'p-limit';

/** Opaque durable store keyed by string. Values are whole encoded documents. */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  public async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  public async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  public async delete(key: string): Promise<void> {
    this.values.delete(key);
  }
}

/**
 * One `<key>.json` file per key. Writes go to a temp file that is renamed over
 * the target, so a reader never sees a half-written document.
 */
export class FileKeyValueStore implements KeyValueStore {
  private readonly writeLock = pLimit(1);

  constructor(private readonly dir: string) {
    if (!fs.existsSync(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true });
    }
  }

  public async get(key: string): Promise<string | null> {
    try {
      return await fs.promises.readFile(this.pathFor(key), 'utf8');
    } catch (error: unknown) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  public set(key: string, value: string): Promise<void> {
    return this.writeLock(async () => {
      const target = this.pathFor(key);
      const tmp = `${target}.tmp`;
      await fs.promises.writeFile(tmp, value, 'utf8');
      await fs.promises.rename(tmp, target);
    });
  }

  public delete(key: string): Promise<void> {
    return this.writeLock(async () => {
      try {
        await fs.promises.unlink(this.pathFor(key));
      } catch (error: unknown) {
        if (!isNotFound(error)) throw error;
      }
    });
  }

  private pathFor(key: string): string {
    return path.join(this.dir, `${encodeURIComponent(key)}.json`);
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

import { logger } from '../logger';

export interface Disposable {
  dispose(): void;
}

/**
 * Type-safe event emitter with error isolation: one handler throwing does not
 * stop the others from running.
 */
export class EventEmitter<TEventMap extends Record<string, unknown>> {
  private handlers: Map<keyof TEventMap, Set<(payload: never) => void>> = new Map();

  public on<K extends keyof TEventMap>(event: K, handler: (payload: TEventMap[K]) => void): Disposable {
    let set = this.handlers.get(event);
    if (!set) {
      set = new Set();
      this.handlers.set(event, set);
    }
    set.add(handler);

    return {
      dispose: (): void => this.off(event, handler),
    };
  }

  public off<K extends keyof TEventMap>(event: K, handler: (payload: TEventMap[K]) => void): void {
    this.handlers.get(event)?.delete(handler);
  }

  public emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): void {
    const set = this.handlers.get(event);
    if (!set) return;

    for (const handler of [...set]) {
      try {
        (handler as (payload: TEventMap[K]) => void)(payload);
      } catch (error: unknown) {
        logger.error(`Handler error for event '${String(event)}':`, error);
      }
    }
  }
}

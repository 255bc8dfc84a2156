import type { LoggerLike, SessionValue } from '../types';
import type { SessionData } from './codec';
import type { SessionKey, SessionStore } from './store';

export interface OpenSessionOptions {
  id: string;
  ttlSeconds?: number;
  logger?: LoggerLike;
}

/**
 * Per-turn handle on one conversation's data. The record is read once when
 * the session is opened and written once by `flush()` at the end of the turn;
 * everything in between is synchronous, which is what lets a replay run
 * without suspension points. Turns for the same session id must not
 * interleave between `open` and `flush`.
 */
export class Session {
  private data: SessionData;
  private destroyed = false;
  private dirty = false;

  private constructor(
    readonly id: string,
    readonly key: SessionKey,
    private readonly store: SessionStore,
    private persisted: boolean,
    data: SessionData,
    private readonly ttlSeconds: number | undefined,
    private readonly logger: LoggerLike | undefined,
  ) {
    this.data = data;
  }

  /** Load the record stored under `key`, or start an empty one. */
  static async open(store: SessionStore, key: SessionKey, options: OpenSessionOptions): Promise<Session> {
    const existing = await store.read(key);
    options.logger?.debug?.({ sessionId: options.id, resumed: Boolean(existing) }, 'Session opened');

    return new Session(
      options.id,
      key,
      store,
      existing !== undefined,
      existing ?? {},
      options.ttlSeconds,
      options.logger,
    );
  }

  get(key: string): SessionValue | undefined {
    return Object.hasOwn(this.data, key) ? this.data[key] : undefined;
  }

  has(key: string): boolean {
    return Object.hasOwn(this.data, key);
  }

  set<T extends SessionValue>(key: string, value: T): T {
    this.destroyed = false;
    this.data[key] = value;
    this.dirty = true;
    return value;
  }

  delete(key: string): void {
    if (!Object.hasOwn(this.data, key)) {
      return;
    }
    delete this.data[key];
    this.dirty = true;
  }

  keys(): string[] {
    return Object.keys(this.data);
  }

  /** Drop every value while keeping the session usable for this turn. */
  clear(): void {
    this.data = {};
    this.dirty = true;
  }

  /**
   * End the session. The record is removed on flush unless something is
   * written to the session again later in the same turn.
   */
  destroy(): void {
    this.data = {};
    this.destroyed = true;
    this.dirty = true;
  }

  exists(): boolean {
    if (this.destroyed) {
      return false;
    }
    return this.persisted || Object.keys(this.data).length > 0;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /** Shallow copy of the current data, for logging and assertions. */
  snapshot(): SessionData {
    return { ...this.data };
  }

  /** Persist this turn's changes. Empty sessions leave no record behind. */
  async flush(): Promise<void> {
    if (!this.dirty) {
      return;
    }

    if (this.destroyed || Object.keys(this.data).length === 0) {
      if (this.persisted) {
        await this.store.delete(this.key);
        this.logger?.debug?.({ sessionId: this.id }, 'Session removed');
      }
      this.persisted = false;
    } else {
      await this.store.write(this.key, this.data, this.ttlSeconds);
      this.persisted = true;
    }

    this.dirty = false;
  }
}

/**
 * Key-value storage for one encoded game per session. Values are opaque to
 * the store; callers decode and validate what they read back.
 */
export interface SessionStore {
  get(id: string): unknown;
  set(id: string, value: unknown): void;
  delete(id: string): boolean;
}

interface Entry {
  value: unknown;
  expiresAt: number;
}

export interface MemorySessionStoreOptions {
  ttlMs: number;
  now?: () => number;
}

export class MemorySessionStore implements SessionStore {
  private readonly entries = new Map<string, Entry>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: MemorySessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get(id: string): unknown {
    const entry = this.entries.get(id);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(id);
      return undefined;
    }
    return entry.value;
  }

  set(id: string, value: unknown): void {
    this.entries.set(id, { value, expiresAt: this.now() + this.ttlMs });
  }

  delete(id: string): boolean {
    return this.entries.delete(id);
  }

  /** Drops expired entries and returns how many were removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

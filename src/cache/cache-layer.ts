/**
 * Cache capability for short-lived flow values (state, PKCE verifiers)
 */

export interface CacheLayer {
  /** @returns The stored value, or undefined when absent or expired */
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
}

/**
 * In-process cache with per-entry expiry.
 * Suitable for development and testing only: entries are not shared
 * between processes.
 */
export class MemoryCacheLayer implements CacheLayer {
  private readonly entries = new Map<
    string,
    { value: string; expiresAt: number }
  >();

  public constructor(private readonly now: () => number = Date.now) {}

  public async get(key: string): Promise<string | undefined> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  public async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  /** Number of entries, expired ones included until next read */
  public get size(): number {
    return this.entries.size;
  }
}

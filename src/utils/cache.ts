/**
 * Keys remembered for a fixed time, oldest evicted first once `limit` is reached.
 * The webhook uses it to drop Cloud API redeliveries of a message id.
 */
export class ExpiringSet {
  private readonly expiries = new Map<string, number>();

  constructor(
    private readonly ttlMs = 6 * 60 * 60 * 1000,
    private readonly limit = 50_000,
    private readonly now: () => number = Date.now
  ) {}

  has(key: string): boolean {
    const expires = this.expiries.get(key);
    if (expires === undefined) return false;
    if (this.now() > expires) {
      this.expiries.delete(key);
      return false;
    }
    return true;
  }

  /** Returns false when the key was already present and unexpired. */
  add(key: string): boolean {
    if (this.has(key)) return false;

    if (this.expiries.size >= this.limit) {
      this.pruneExpired();
      if (this.expiries.size >= this.limit) {
        const oldest = this.expiries.keys().next();
        if (!oldest.done) this.expiries.delete(oldest.value);
      }
    }

    this.expiries.set(key, this.now() + this.ttlMs);
    return true;
  }

  size(): number {
    this.pruneExpired();
    return this.expiries.size;
  }

  private pruneExpired(): void {
    const now = this.now();
    for (const [key, expires] of this.expiries) {
      if (now > expires) this.expiries.delete(key);
    }
  }
}

/**
 * Duplicate signal store.
 * Remembers which order ids were executed in which wall-clock second so a
 * repeated alert inside the same second is skipped. Entries older than the
 * retention window are swept; entries of the current second never are.
 */

export const DEFAULT_RETENTION_SECONDS = 60;

export class DedupStore {
  readonly #seen = new Map<string, number>();
  readonly #retentionSeconds: number;
  #lastSweep = 0;

  constructor(retentionSeconds: number = DEFAULT_RETENTION_SECONDS) {
    this.#retentionSeconds = retentionSeconds;
  }

  get size(): number {
    return this.#seen.size;
  }

  static key(orderId: string, second: number): string {
    return `${orderId}_${second}`;
  }

  /**
   * Returns true when `orderId` was already marked in the same second.
   * Otherwise marks it and returns false.
   */
  checkAndMark(orderId: string, nowSeconds: number): boolean {
    const second = Math.floor(nowSeconds);
    this.#sweep(second);

    const key = DedupStore.key(orderId, second);
    if (this.#seen.has(key)) return true;
    this.#seen.set(key, second);
    return false;
  }

  #sweep(second: number): void {
    if (second - this.#lastSweep < this.#retentionSeconds) return;
    this.#lastSweep = second;

    const cutoff = second - this.#retentionSeconds;
    for (const [key, seenAt] of this.#seen) {
      if (seenAt < cutoff) this.#seen.delete(key);
    }
  }
}

export type Clock = () => number;

/**
 * One cached value with a time-to-live measured on an injected clock.
 */
export class TtlCache<T> {
  private value: T | undefined;
  private storedAt = 0;

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = Date.now
  ) {}

  get(): T | undefined {
    if (this.value === undefined) return undefined;
    if (this.clock() - this.storedAt >= this.ttlMs) {
      this.value = undefined;
      return undefined;
    }
    return this.value;
  }

  set(value: T): void {
    this.value = value;
    this.storedAt = this.clock();
  }

  invalidate(): void {
    this.value = undefined;
  }
}

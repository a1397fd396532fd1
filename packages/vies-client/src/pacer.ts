/**
 * Spaces request starts at least `intervalMs` apart across every caller
 * sharing the instance. Slots are reserved synchronously, so concurrent
 * callers queue up in call order.
 */
export class RequestPacer {
  private nextSlotAt = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Resolve when the caller may start its request.
   */
  async wait(): Promise<void> {
    if (this.intervalMs <= 0) return;

    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.intervalMs;

    const delay = slot - now;
    if (delay > 0) {
      await sleep(delay);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

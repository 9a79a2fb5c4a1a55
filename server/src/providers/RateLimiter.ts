// Token bucket refilled continuously at `rpm` tokens per minute
export class RateLimiter {
  private readonly capacity: number;
  private readonly refillPerMs: number;
  private tokens: number;
  private last: number;

  constructor(rpm: number, private readonly now: () => number = Date.now) {
    const perMinute = Math.max(1, rpm);
    this.capacity = perMinute;
    this.refillPerMs = perMinute / 60000;
    this.tokens = perMinute;
    this.last = this.now();
  }

  available(): number {
    this.refill();
    return this.tokens;
  }

  take(cost = 1): boolean {
    this.refill();
    if (this.tokens >= cost) { this.tokens -= cost; return true; }
    return false;
  }

  async waitFor(cost = 1): Promise<void> {
    const need = Math.min(cost, this.capacity);
    while (!this.take(need)) {
      const ms = Math.ceil((need - this.tokens) / this.refillPerMs);
      await new Promise<void>((resolve) => setTimeout(resolve, ms));
    }
  }

  private refill() {
    const now = this.now();
    const delta = now - this.last;
    if (delta <= 0) return;
    this.tokens = Math.min(this.capacity, this.tokens + delta * this.refillPerMs);
    this.last = now;
  }
}

export class TokenBucketRateLimiter {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private readonly maxTokens: number,
    private readonly refillRate: number, // tokens per second
  ) {
    this.tokens = maxTokens;
    this.lastRefill = Date.now();
  }

  static perMinute(requests: number): TokenBucketRateLimiter {
    return new TokenBucketRateLimiter(requests, requests / 60);
  }

  private refill() {
    const now = Date.now();
    const elapsed = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }

  async acquire(count = 1): Promise<void> {
    this.refill();
    if (this.tokens >= count) {
      this.tokens -= count;
      return;
    }
    const waitTime = ((count - this.tokens) / this.refillRate) * 1000;
    // reserve before sleeping so concurrent callers queue behind this one
    this.tokens -= count;
    await new Promise((resolve) => setTimeout(resolve, waitTime));
    this.refill();
  }

  get available(): number {
    this.refill();
    return Math.max(0, Math.floor(this.tokens));
  }
}

/**
 * Fixed one-second window on accepted handshakes. A limit of 0 disables it.
 */
export class ConnectionRateLimiter {
  private windowStart = 0;
  private count = 0;

  constructor(
    private readonly perSecond: number,
    private readonly now: () => number = Date.now,
  ) {}

  tryAcquire(): boolean {
    if (this.perSecond <= 0) {
      return true;
    }

    const current = this.now();
    if (current - this.windowStart >= 1000) {
      this.windowStart = current;
      this.count = 0;
    }

    if (this.count >= this.perSecond) {
      return false;
    }
    this.count += 1;
    return true;
  }
}

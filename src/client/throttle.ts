import Bottleneck from 'bottleneck';

/**
 * One limiter per remote host: at most `requestsPerSecond` calls per second,
 * one in flight at a time.
 */
export class HostThrottle {
  private readonly limiters = new Map<string, Bottleneck>();
  private readonly requestsPerSecond: number;

  constructor(requestsPerSecond: number) {
    this.requestsPerSecond = Math.max(1, Math.floor(requestsPerSecond));
  }

  schedule<T>(url: string, task: () => Promise<T>): Promise<T> {
    return this.getLimiter(new URL(url).host).schedule(task);
  }

  private getLimiter(host: string): Bottleneck {
    const existing = this.limiters.get(host);
    if (existing) return existing;

    const limiter = new Bottleneck({
      reservoir: this.requestsPerSecond,
      reservoirRefreshAmount: this.requestsPerSecond,
      reservoirRefreshInterval: 1000,
      maxConcurrent: 1
    });
    this.limiters.set(host, limiter);
    return limiter;
  }
}

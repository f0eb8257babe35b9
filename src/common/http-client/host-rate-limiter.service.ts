import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import Bottleneck from 'bottleneck';

const MAX_CONCURRENT_PER_HOST = 5;

/**
 * One Bottleneck per host and rate. Tasks are scheduled once; a failure is
 * handed back to the caller as is.
 */
@Injectable()
export class HostRateLimiter implements OnModuleDestroy {
  private readonly logger = new Logger(HostRateLimiter.name);
  private readonly limiters = new Map<string, Bottleneck>();

  /** Runs `task` at once when `rps` is unset, else through the host's limiter. */
  run<T>(url: string, rps: number | null, task: () => Promise<T>): Promise<T> {
    if (rps === null || rps <= 0) {
      return task();
    }
    return this.limiterFor(new URL(url).hostname, rps).schedule(task);
  }

  async onModuleDestroy(): Promise<void> {
    const limiters = [...this.limiters.values()];
    this.limiters.clear();
    await Promise.all(limiters.map((limiter) => limiter.stop()));
  }

  private limiterFor(host: string, rps: number): Bottleneck {
    const key = `${host}@${rps}`;
    const existing = this.limiters.get(key);
    if (existing) {
      return existing;
    }

    const perSecond = Math.max(1, Math.floor(rps));
    const limiter = new Bottleneck({
      minTime: Math.ceil(1000 / rps),
      maxConcurrent: MAX_CONCURRENT_PER_HOST,
      reservoir: perSecond,
      reservoirRefreshAmount: perSecond,
      reservoirRefreshInterval: 1000,
    });
    limiter.on('error', (error) => {
      this.logger.error(`Rate limiter error for ${host}`, error);
    });

    this.limiters.set(key, limiter);
    this.logger.debug(`Limiting ${host} to ${rps} requests per second`);
    return limiter;
  }
}

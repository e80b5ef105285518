import { CounterStore, Principal, RateLimiter, RateLimitResult, Translation } from '../types/gateway.js';

export interface FixedWindowConfig {
  windowSeconds: number;
  threshold: number;
  namespace: string;
  /** Anonymous deployments are throttled elsewhere; the limiter is skipped entirely. */
  allowAnonymous: boolean;
}

export function bucketKey(principal: Principal): string {
  return `ratelimit:${principal.id}`;
}

export function requestCounterKey(namespace: string, publicPath: string): string {
  return `${namespace}:request:${publicPath}`;
}

export function accumulatedCounterKey(namespace: string, publicPath: string): string {
  return `${namespace}:accumulated:${publicPath}`;
}

/**
 * Fixed-window limiter keyed by principal. Store failures propagate; they are
 * never read as "allow".
 */
export class FixedWindowRateLimiter implements RateLimiter {
  constructor(
    private readonly store: CounterStore,
    private readonly config: FixedWindowConfig,
  ) {
    if (!Number.isInteger(config.windowSeconds) || config.windowSeconds <= 0) {
      throw new Error('[rateLimit] windowSeconds must be a positive integer');
    }
    if (!Number.isInteger(config.threshold) || config.threshold <= 0) {
      throw new Error('[rateLimit] threshold must be a positive integer');
    }
  }

  async admit(principal: Principal, translation: Translation): Promise<RateLimitResult> {
    const limit = this.config.threshold;
    if (this.config.allowAnonymous) {
      return { allowed: true, limit };
    }

    const { namespace } = this.config;
    const publicPath = translation.rule.publicPath;
    const usage = await this.store.recordAdmission(
      {
        requestKey: requestCounterKey(namespace, publicPath),
        statisticsMember: translation.statisticsKey,
        bucketKey: bucketKey(principal),
        accumulatedKey: accumulatedCounterKey(namespace, publicPath),
      },
      this.config.windowSeconds,
    );

    return { allowed: usage <= limit, usage, limit };
  }
}

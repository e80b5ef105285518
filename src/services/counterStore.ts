import { AdmissionKeys, Clock, CounterStore, RuleStatistics } from '../types/gateway.js';

/** The node-redis surface the counter store uses. */
export interface CounterTransaction {
  zIncrBy(key: string, increment: number, member: string): this;
  expire(key: string, seconds: number, mode: 'NX'): this;
  incr(key: string): this;
  exec(): Promise<unknown[]>;
}

export interface CounterClient {
  multi(): CounterTransaction;
  get(key: string): Promise<unknown>;
  zRangeWithScores(
    key: string,
    start: number,
    stop: number,
    options: { REV: true },
  ): Promise<Array<{ value: unknown; score: number }>>;
}

function toNumber(reply: unknown, command: string): number {
  const value = typeof reply === 'string' ? Number(reply) : reply;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`Unexpected reply to ${command}: ${String(reply)}`);
  }
  return value;
}

/**
 * Redis-backed counters. The admission unit is a single MULTI/EXEC so that
 * concurrent requests for one bucket never interleave.
 */
export class RedisCounterStore implements CounterStore {
  constructor(private readonly client: CounterClient) {}

  async recordAdmission(keys: AdmissionKeys, windowSeconds: number): Promise<number> {
    const replies = await this.client
      .multi()
      .zIncrBy(keys.requestKey, 1, keys.statisticsMember)
      .incr(keys.bucketKey)
      // EXPIRE is a no-op on a missing key, so it follows INCR. NX keeps the window anchored at first use.
      .expire(keys.bucketKey, windowSeconds, 'NX')
      .incr(keys.accumulatedKey)
      .exec();
    return toNumber(replies[1], 'INCR');
  }

  async readStatistics(requestKey: string, accumulatedKey: string): Promise<RuleStatistics> {
    const [accumulated, requests] = await Promise.all([
      this.client.get(accumulatedKey),
      this.client.zRangeWithScores(requestKey, 0, -1, { REV: true }),
    ]);
    return {
      accumulated: accumulated === null ? 0 : toNumber(accumulated, 'GET'),
      requests: requests.map(({ value, score }) => ({ key: String(value), count: score })),
    };
  }
}

interface Bucket {
  count: number;
  expiresAt?: number;
}

/** Single-process counter store with the same expiry semantics, for tests and local runs. */
export class InMemoryCounterStore implements CounterStore {
  private readonly buckets = new Map<string, Bucket>();
  private readonly sortedSets = new Map<string, Map<string, number>>();
  private readonly counters = new Map<string, number>();

  constructor(private readonly clock: Clock = Date.now) {}

  async recordAdmission(keys: AdmissionKeys, windowSeconds: number): Promise<number> {
    const members = this.sortedSets.get(keys.requestKey) ?? new Map<string, number>();
    members.set(keys.statisticsMember, (members.get(keys.statisticsMember) ?? 0) + 1);
    this.sortedSets.set(keys.requestKey, members);

    const usage = this.incr(keys.bucketKey);
    this.expireIfUnset(keys.bucketKey, windowSeconds);

    this.counters.set(keys.accumulatedKey, (this.counters.get(keys.accumulatedKey) ?? 0) + 1);
    return usage;
  }

  async readStatistics(requestKey: string, accumulatedKey: string): Promise<RuleStatistics> {
    const members = this.sortedSets.get(requestKey) ?? new Map<string, number>();
    return {
      accumulated: this.counters.get(accumulatedKey) ?? 0,
      requests: [...members.entries()]
        .map(([key, count]) => ({ key, count }))
        .sort((a, b) => b.count - a.count),
    };
  }

  /**
   * `EXPIRE key seconds NX`: sets an expiry only on an existing key without
   * one. Returns whether the expiry was set.
   */
  expireIfUnset(key: string, windowSeconds: number): boolean {
    const bucket = this.liveBucket(key);
    if (!bucket || bucket.expiresAt !== undefined) return false;
    bucket.expiresAt = this.clock() + windowSeconds * 1000;
    return true;
  }

  /** Expiry timestamp of a bucket, if one is set and still live. */
  bucketExpiry(bucketKey: string): number | undefined {
    return this.liveBucket(bucketKey)?.expiresAt;
  }

  private incr(key: string): number {
    const bucket = this.liveBucket(key) ?? { count: 0 };
    bucket.count += 1;
    this.buckets.set(key, bucket);
    return bucket.count;
  }

  private liveBucket(key: string): Bucket | undefined {
    const existing = this.buckets.get(key);
    if (existing && existing.expiresAt !== undefined && existing.expiresAt <= this.clock()) {
      this.buckets.delete(key);
      return undefined;
    }
    return existing;
  }
}

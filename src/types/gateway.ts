/** A path-translation rule loaded from a rule file at startup. */
export interface Rule {
  /** Path under `/v1/` that this rule answers, without surrounding slashes. */
  publicPath: string;
  /** Absolute upstream URL that path segments are appended to as query arguments. */
  upstreamTemplate: string;
  /** One query argument name per expected path segment, in order. */
  queryArgumentNames: readonly string[];
}

/** A verified caller together with the window its credential is valid for. */
export interface Principal {
  id: string;
  name: string;
  validSince: number; // ms since epoch
  validUntil: number; // ms since epoch
  isSuperuser: boolean;
}

/** Which auth headers, if any, to attach to the outgoing response. */
export type SaveDirective =
  | { kind: 'dont-save' }
  | { kind: 'refresh-expiry'; validUntil: number }
  | { kind: 'issue-token'; principal: Principal };

/** Result of resolving who is calling. */
export type AuthOutcome =
  | { kind: 'anonymous'; principal: Principal }
  | { kind: 'reauthenticated'; principal: Principal }
  | { kind: 'fresh-auth'; principal: Principal }
  | { kind: 'rejected'; error: Error };

/** A successful path translation. */
export interface Translation {
  rule: Rule;
  upstreamUrl: URL;
  /** Literal path segments joined with `:`; diagnostics only. */
  statisticsKey: string;
}

/** Result of a rate-limit admission check. */
export interface RateLimitResult {
  allowed: boolean;
  /** Bucket usage after this request; absent when the limiter was bypassed. */
  usage?: number;
  limit: number;
}

/** Millisecond clock, injectable for tests. */
export type Clock = () => number;

/** Verifies a claimed identity against the external session service. */
export interface IdentityVerifier {
  verify(username: string, serverId: string): Promise<Principal | null>;
}

/** Admission control keyed by principal identity. */
export interface RateLimiter {
  admit(principal: Principal, translation: Translation): Promise<RateLimitResult>;
}

/** Keys touched by one admission unit of work. */
export interface AdmissionKeys {
  requestKey: string;
  statisticsMember: string;
  bucketKey: string;
  accumulatedKey: string;
}

/** Shared counter store backing the rate limiter and the statistics endpoint. */
export interface CounterStore {
  /**
   * Runs the admission unit atomically and returns the bucket's usage after
   * the increment. The bucket expiry is only set when it has none.
   */
  recordAdmission(keys: AdmissionKeys, windowSeconds: number): Promise<number>;
  readStatistics(requestKey: string, accumulatedKey: string): Promise<RuleStatistics>;
}

export interface RuleStatistics {
  accumulated: number;
  requests: Array<{ key: string; count: number }>;
}

/** Issues the GET against the upstream API. */
export interface UpstreamClient {
  fetch(url: URL): Promise<Response>;
}


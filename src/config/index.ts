import { z } from 'zod';

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => value === 'true');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  URSA_HYPIXEL_TOKEN: z.string().min(1),
  URSA_UPSTREAM_KEY_HEADER: z.string().min(1).default('API-Key'),
  URSA_SECRET: z.string().min(1),
  URSA_RULES: z.string().min(1),
  URSA_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  URSA_HOST: z.string().min(1).default('127.0.0.1'),
  URSA_ANONYMOUS: booleanFlag,
  URSA_TOKEN_LIFETIME_SECONDS: positiveInt(3600),
  URSA_RATE_LIMIT_WINDOW_SECONDS: positiveInt(60),
  URSA_RATE_LIMIT_THRESHOLD: positiveInt(100),
  URSA_REDIS_URL: z.string().url().default('redis://127.0.0.1:6379'),
  URSA_STATS_NAMESPACE: z.string().min(1).default('hypixel'),
  URSA_SESSION_SERVER_URL: z.string().url().default('https://sessionserver.mojang.com'),
  URSA_LOG_LEVEL: z.string().default('info'),
  URSA_CORS_ORIGINS: z.string().optional(),
});

export interface AppConfig {
  readonly upstreamToken: string;
  readonly upstreamKeyHeader: string;
  readonly secret: string;
  readonly ruleFiles: readonly string[];
  readonly port: number;
  readonly host: string;
  readonly allowAnonymous: boolean;
  readonly tokenLifetimeSeconds: number;
  readonly rateLimit: { readonly windowSeconds: number; readonly threshold: number };
  readonly redisUrl: string;
  readonly statsNamespace: string;
  readonly sessionServerUrl: string;
  readonly logLevel: string;
  /** Allowed CORS origins; undefined allows any. */
  readonly corsOrigins?: readonly string[];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validates `URSA_*` variables. Error messages name the variable and the
 * problem, never the supplied value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  const parsed = result.data;
  return Object.freeze({
    upstreamToken: parsed.URSA_HYPIXEL_TOKEN,
    upstreamKeyHeader: parsed.URSA_UPSTREAM_KEY_HEADER,
    secret: parsed.URSA_SECRET,
    ruleFiles: parsed.URSA_RULES.split(':').filter((path) => path.trim() !== ''),
    port: parsed.URSA_PORT,
    host: parsed.URSA_HOST,
    allowAnonymous: parsed.URSA_ANONYMOUS,
    tokenLifetimeSeconds: parsed.URSA_TOKEN_LIFETIME_SECONDS,
    rateLimit: Object.freeze({
      windowSeconds: parsed.URSA_RATE_LIMIT_WINDOW_SECONDS,
      threshold: parsed.URSA_RATE_LIMIT_THRESHOLD,
    }),
    redisUrl: parsed.URSA_REDIS_URL,
    statsNamespace: parsed.URSA_STATS_NAMESPACE,
    sessionServerUrl: parsed.URSA_SESSION_SERVER_URL,
    logLevel: parsed.URSA_LOG_LEVEL,
    corsOrigins: parsed.URSA_CORS_ORIGINS
      ?.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
  });
}

const REDACTED = '[redacted]';

function redactUrlPassword(raw: string): string {
  const url = new URL(raw);
  if (url.password) url.password = 'redacted';
  return url.toString();
}

/** Configuration as it may appear in logs. */
export function describeConfig(config: AppConfig): Record<string, unknown> {
  return {
    ...config,
    upstreamToken: REDACTED,
    secret: REDACTED,
    redisUrl: redactUrlPassword(config.redisUrl),
  };
}

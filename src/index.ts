import dotenv from 'dotenv';
import type { Server } from 'node:http';
import { createApp } from './app.js';
import { describeConfig, loadConfig } from './config/index.js';
import { loadRuleTable } from './config/rules.js';
import { createLogger } from './lib/logger.js';
import { RedisCounterStore } from './services/counterStore.js';
import { SessionServerVerifier } from './services/identityVerifier.js';
import { FixedWindowRateLimiter } from './services/rateLimiter.js';
import { createRedisClient } from './services/redisClient.js';
import { TokenCodec } from './services/tokenCodec.js';
import { KeyedUpstreamClient } from './services/upstreamClient.js';

async function startServer(): Promise<void> {
  const dotenvResult = dotenv.config();
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  if (!dotenvResult.error) {
    logger.info('loaded environment from .env');
  }

  const rules = loadRuleTable(config.ruleFiles);
  logger.info({ config: describeConfig(config), rules: rules.list() }, 'ursa-gateway starting');

  const redis = createRedisClient(config.redisUrl, logger);
  await redis.connect();

  const counters = new RedisCounterStore(redis);
  const codec = new TokenCodec(config.secret);

  const app = createApp({
    config,
    rules,
    codec,
    counters,
    logger,
    identityVerifier: new SessionServerVerifier({
      baseUrl: config.sessionServerUrl,
      tokenLifetimeSeconds: config.tokenLifetimeSeconds,
      logger,
    }),
    rateLimiter: new FixedWindowRateLimiter(counters, {
      windowSeconds: config.rateLimit.windowSeconds,
      threshold: config.rateLimit.threshold,
      namespace: config.statsNamespace,
      allowAnonymous: config.allowAnonymous,
    }),
    upstream: new KeyedUpstreamClient({
      apiKey: config.upstreamToken,
      keyHeader: config.upstreamKeyHeader,
      logger,
    }),
  });

  const server: Server = app.listen(config.port, config.host, () => {
    logger.info(`ursa-gateway listening on http://${config.host}:${config.port}`);
  });

  // In-flight requests finish; new connections are refused.
  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'shutting down');
    server.close((closeError) => {
      if (closeError) logger.error({ err: closeError }, 'error while closing server');
      redis
        .quit()
        .catch((err: unknown) => logger.error({ err }, 'error while closing redis'))
        .finally(() => process.exit(closeError ? 1 : 0));
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

startServer().catch((error: unknown) => {
  console.error('Failed to start server:', error instanceof Error ? error.message : error);
  process.exit(1);
});

import { createClient } from 'redis';
import type { Logger } from '../lib/logger.js';

export type RedisClient = ReturnType<typeof createClient>;

// Debounce noisy reconnect errors.
const ERR_DEBOUNCE_MS = 5000;

function formatRedisError(err: unknown): string {
  if (err instanceof AggregateError && err.errors.length > 0) {
    return `AggregateError: ${err.errors.map((inner) => (inner instanceof Error ? inner.message : String(inner))).join(' | ')}`;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Builds a client for the shared counter store. Commands issued while the
 * connection is down fail instead of queueing, so an outage surfaces as an
 * error on the request that needed the store.
 */
export function createRedisClient(url: string, logger: Logger): RedisClient {
  let lastErrAt = 0;

  const client = createClient({
    url,
    disableOfflineQueue: true,
    socket: {
      // back off quickly then cap at 1s
      reconnectStrategy: (retries) => Math.min(1000, Math.max(50, retries * 100)),
      keepAlive: 60_000,
      noDelay: true,
    },
  });

  client.on('ready', () => {
    logger.info('redis ready');
  });

  client.on('error', (err: unknown) => {
    const now = Date.now();
    if (now - lastErrAt >= ERR_DEBOUNCE_MS) {
      lastErrAt = now;
      logger.error({ reason: formatRedisError(err) }, 'redis error');
    }
  });

  return client;
}

import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(raw: string | undefined): LevelWithSilent {
  if (process.env.NODE_ENV === 'test') return 'silent';
  const level = LEVELS.find((candidate) => candidate === raw?.trim().toLowerCase());
  return level ?? 'info';
}

export function createLogger(level?: string): Logger {
  return pino({
    name: 'ursa-gateway',
    level: resolveLevel(level),
    redact: {
      paths: ['req.headers["x-ursa-token"]', 'req.headers.authorization'],
      censor: '[redacted]',
    },
  });
}

export const logger = createLogger(process.env.URSA_LOG_LEVEL);

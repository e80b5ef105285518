import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { AppConfig } from './config/index.js';
import { RuleTable } from './data/ruleTable.js';
import { logger as defaultLogger, type Logger } from './lib/logger.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/logging.js';
import { requireLogin } from './middleware/requireLogin.js';
import { createMetaRouter, readPackageInfo, type PackageInfo } from './routes/metaRoutes.js';
import { createProxyRouter } from './routes/proxyRoutes.js';
import {
  AuthSessionManager,
  SERVER_ID_HEADER,
  TOKEN_HEADER,
  EXPIRES_HEADER,
  USERNAME_HEADER,
} from './services/authSession.js';
import { TokenCodec } from './services/tokenCodec.js';
import { CounterStore, IdentityVerifier, RateLimiter, UpstreamClient } from './types/gateway.js';

export interface AppDependencies {
  config: Pick<AppConfig, 'allowAnonymous' | 'statsNamespace' | 'corsOrigins'>;
  rules: RuleTable;
  codec: TokenCodec;
  identityVerifier: IdentityVerifier;
  rateLimiter: RateLimiter;
  upstream: UpstreamClient;
  counters: CounterStore;
  logger?: Logger;
  packageInfo?: PackageInfo;
}

export const createApp = (dependencies: AppDependencies) => {
  const app = express();
  const { config, rules, codec, rateLimiter, upstream, counters } = dependencies;
  const logger = dependencies.logger ?? defaultLogger;
  const packageInfo = dependencies.packageInfo ?? readPackageInfo();

  const sessions = new AuthSessionManager({
    allowAnonymous: config.allowAnonymous,
    codec,
    verifier: dependencies.identityVerifier,
  });
  const login = requireLogin(sessions);

  app.disable('x-powered-by');
  app.use(requestLogger(logger));

  const isProduction = process.env.NODE_ENV === 'production';
  app.use(
    helmet({
      // HSTS only when we know we're behind HTTPS in production
      hsts: isProduction ? { maxAge: 15552000, includeSubDomains: false, preload: false } : false,
      // JSON and plain text only
      contentSecurityPolicy: false,
    }),
  );

  const allowedOrigins = config.corsOrigins;
  app.use(
    cors({
      origin(origin, callback) {
        if (!origin || !allowedOrigins || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(null, false);
        }
      },
      methods: ['GET', 'HEAD', 'OPTIONS'],
      allowedHeaders: [TOKEN_HEADER, USERNAME_HEADER, SERVER_ID_HEADER],
      exposedHeaders: [TOKEN_HEADER, EXPIRES_HEADER, 'x-request-id'],
    }),
  );

  app.get('/', (_req, res) => {
    res.status(302).location(packageInfo.homepage || '/_meta/version').end();
  });

  app.use(
    '/_meta',
    createMetaRouter({
      rules,
      counters,
      codec,
      statsNamespace: config.statsNamespace,
      packageInfo,
      login,
    }),
  );

  app.use('/v1', login, createProxyRouter({ rules, rateLimiter, upstream, codec, logger }));

  app.use(notFoundHandler());
  app.use(errorHandler({ codec, logger }));

  return app;
};

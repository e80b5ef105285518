import { readFileSync } from 'fs';
import { join } from 'path';
import { Router } from 'express';
import { RuleTable } from '../data/ruleTable.js';
import { ForbiddenError, NotFoundError } from '../errors/index.js';
import { asyncHandler } from '../lib/asyncHandler.js';
import { applySaveDirective } from '../middleware/saveDirective.js';
import { accumulatedCounterKey, requestCounterKey } from '../services/rateLimiter.js';
import { TokenCodec } from '../services/tokenCodec.js';
import { CounterStore, Principal } from '../types/gateway.js';

export interface PackageInfo {
  version: string;
  homepage: string;
}

function stringField(raw: unknown, field: string): string | undefined {
  if (typeof raw !== 'object' || raw === null) return undefined;
  const value: unknown = Reflect.get(raw, field);
  return typeof value === 'string' ? value : undefined;
}

export function readPackageInfo(): PackageInfo {
  // Same relative location from src/routes and dist/routes.
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf8'));
  return {
    version: stringField(raw, 'version') ?? 'unknown',
    homepage: stringField(raw, 'homepage') ?? '',
  };
}

export interface MetaDeps {
  rules: RuleTable;
  counters: CounterStore;
  codec: TokenCodec;
  statsNamespace: string;
  packageInfo: PackageInfo;
  /** Login middleware run before the authenticated meta routes. */
  login: ReturnType<typeof asyncHandler>;
}

function requirePrincipal(principal: Principal | undefined): Principal {
  if (!principal) throw new Error('meta route reached without a principal');
  return principal;
}

/** Router for `/_meta/...`: version, the caller's principal and per-rule statistics. */
export function createMetaRouter(deps: MetaDeps): Router {
  const { rules, counters, codec, statsNamespace, login } = deps;
  const { version, homepage } = deps.packageInfo;
  const router = Router();

  router.get('/version', (_req, res) => {
    res.type('text/plain').send(`ursa-gateway ${version} ${homepage}`);
  });

  router.get(
    '/principal',
    login,
    asyncHandler(async (_req, res) => {
      const principal = requirePrincipal(res.locals.principal);
      applySaveDirective(res, codec);
      res.json(principal);
    }),
  );

  router.get(
    '/statistics/*',
    login,
    asyncHandler(async (req, res) => {
      const principal = requirePrincipal(res.locals.principal);
      if (!principal.isSuperuser) {
        throw new ForbiddenError('Statistics require a superuser token');
      }
      const publicPath = req.path.slice('/statistics/'.length);
      const rule = rules.get(publicPath);
      if (!rule) {
        throw new NotFoundError(`Unknown rule ${publicPath}`);
      }
      const stats = await counters.readStatistics(
        requestCounterKey(statsNamespace, rule.publicPath),
        accumulatedCounterKey(statsNamespace, rule.publicPath),
      );
      applySaveDirective(res, codec);
      res.json({ path: rule.publicPath, ...stats });
    }),
  );

  router.get(
    '/:name',
    asyncHandler(async (req) => {
      throw new NotFoundError(`Unknown meta request ${req.params.name}`);
    }),
  );

  return router;
}

import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { Router, type NextFunction, type Request } from 'express';
import { RuleTable } from '../data/ruleTable.js';
import { RateLimitedError } from '../errors/index.js';
import { asyncHandler, type GatewayResponse } from '../lib/asyncHandler.js';
import type { Logger } from '../lib/logger.js';
import { applySaveDirective } from '../middleware/saveDirective.js';
import { translatePath } from '../services/pathTranslator.js';
import { TokenCodec } from '../services/tokenCodec.js';
import { RateLimiter, UpstreamClient } from '../types/gateway.js';

/** Fixed cache advice: short shared-cache lifetime, longer client lifetime. */
export const CACHE_CONTROL = 'public, s-maxage=60, max-age=300';

export interface ProxyDeps {
  rules: RuleTable;
  rateLimiter: RateLimiter;
  upstream: UpstreamClient;
  codec: TokenCodec;
  logger: Logger;
}

async function streamBody(upstreamRes: Response, res: GatewayResponse): Promise<void> {
  if (!upstreamRes.body) {
    res.end();
    return;
  }
  // Stops reading upstream once the caller disconnects.
  await pipeline(Readable.fromWeb(upstreamRes.body), res);
}

/**
 * Router for `/v1/<public path>/<segments...>`. Mount after `requireLogin`.
 *
 * Flow:
 *   1. Translate the path against the rule table → fall through when no rule matches
 *   2. Rate-limit by principal → 429
 *   3. GET upstream with the API key → 502 on non-200
 *   4. Apply the save directive, then stream the upstream body back
 */
export function createProxyRouter(deps: ProxyDeps): Router {
  const { rules, rateLimiter, upstream, codec, logger } = deps;
  const router = Router();

  router.get('/*', asyncHandler(handleProxy));

  async function handleProxy(req: Request, res: GatewayResponse, next: NextFunction): Promise<void> {
    const translation = translatePath(rules, req.path);
    if (!translation) {
      next();
      return;
    }

    const principal = res.locals.principal;
    if (!principal) {
      throw new Error('proxy route reached without a principal');
    }

    const admission = await rateLimiter.admit(principal, translation);
    if (!admission.allowed) {
      logger.warn(
        { principal: principal.id, rule: translation.rule.publicPath, usage: admission.usage, limit: admission.limit },
        'rate limit exceeded',
      );
      throw new RateLimitedError();
    }

    const upstreamRes = await upstream.fetch(translation.upstreamUrl);

    applySaveDirective(res, codec);
    res.status(200);
    // setHeader rather than res.set: Express would append a charset to the content type.
    res.setHeader('Age', '0');
    res.setHeader('Cache-Control', CACHE_CONTROL);
    res.setHeader('Content-Type', 'application/json');
    await streamBody(upstreamRes, res);
  }

  return router;
}

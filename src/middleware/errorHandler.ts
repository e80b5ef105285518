import { randomUUID } from 'node:crypto';
import type { ErrorRequestHandler, Request } from 'express';
import { GatewayError, NotFoundError } from '../errors/index.js';
import { asyncHandler, type GatewayResponse } from '../lib/asyncHandler.js';
import type { Logger } from '../lib/logger.js';
import { TokenCodec } from '../services/tokenCodec.js';
import { applySaveDirective, clearAuthHeaders } from './saveDirective.js';

export interface ErrorHandlerDeps {
  codec: TokenCodec;
  logger: Logger;
}

export function notFoundHandler() {
  return asyncHandler(async (req) => {
    throw new NotFoundError(`Unknown request path ${req.path}`);
  });
}

function sendInternalError(req: Request, res: GatewayResponse, logger: Logger, err: unknown): void {
  const errorId = randomUUID();
  logger.error({ err, errorId, requestId: req.id }, 'internal error');
  res.status(500).json({ error: 'Internal Server Error', errorId });
}

/**
 * Renders GatewayErrors as `{ error }` with their status. Anything else is
 * logged under a fresh error id and the caller only sees that id.
 */
export function errorHandler({ codec, logger }: ErrorHandlerDeps): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      logger.error({ err, requestId: req.id }, 'response failed after headers were sent');
      next(err);
      return;
    }

    try {
      applySaveDirective(res, codec);
    } catch (directiveError) {
      clearAuthHeaders(res);
      sendInternalError(req, res, logger, directiveError);
      return;
    }

    if (err instanceof GatewayError) {
      res.status(err.statusCode).json({ error: err.message });
      return;
    }
    sendInternalError(req, res, logger, err);
  };
}

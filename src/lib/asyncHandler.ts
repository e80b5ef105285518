import type { NextFunction, Request, Response } from 'express';
import { Principal, SaveDirective } from '../types/gateway.js';

export type GatewayLocals = {
  principal?: Principal;
  saveDirective?: SaveDirective;
};

export type GatewayResponse = Response<unknown, GatewayLocals>;

type GatewayHandler = (req: Request, res: GatewayResponse, next: NextFunction) => Promise<void>;

/** Forwards rejections from async handlers to the Express error handler. */
export function asyncHandler(fn: GatewayHandler) {
  return (req: Request, res: GatewayResponse, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

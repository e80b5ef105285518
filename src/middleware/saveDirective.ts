import type { GatewayResponse } from '../lib/asyncHandler.js';
import { EXPIRES_HEADER, TOKEN_HEADER } from '../services/authSession.js';
import { TokenCodec } from '../services/tokenCodec.js';

/**
 * Writes the pending save directive onto the response and clears it, so it is
 * applied at most once whichever path ends the request. Must run right before
 * the status line is sent.
 */
export function applySaveDirective(res: GatewayResponse, codec: TokenCodec): void {
  const directive = res.locals.saveDirective;
  res.locals.saveDirective = { kind: 'dont-save' };
  if (!directive) return;

  switch (directive.kind) {
    case 'dont-save':
      return;
    case 'refresh-expiry':
      res.setHeader(EXPIRES_HEADER, String(directive.validUntil));
      return;
    case 'issue-token': {
      const token = codec.sign(directive.principal);
      res.setHeader(TOKEN_HEADER, token);
      res.setHeader(EXPIRES_HEADER, String(directive.principal.validUntil));
      return;
    }
  }
}

export function clearAuthHeaders(res: GatewayResponse): void {
  res.removeHeader(TOKEN_HEADER);
  res.removeHeader(EXPIRES_HEADER);
}

import { asyncHandler } from '../lib/asyncHandler.js';
import { AuthSessionManager, saveDirectiveFor } from '../services/authSession.js';

/**
 * Resolves the caller into `res.locals.principal` and records the save
 * directive. Rejections go to the error handler, which still applies the
 * directive.
 */
export function requireLogin(sessions: AuthSessionManager) {
  return asyncHandler(async (req, res, next) => {
    const outcome = await sessions.resolve((name) => req.header(name));
    res.locals.saveDirective = saveDirectiveFor(outcome);
    if (outcome.kind === 'rejected') {
      throw outcome.error;
    }
    res.locals.principal = outcome.principal;
    next();
  });
}

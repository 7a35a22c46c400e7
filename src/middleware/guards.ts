import { Response, NextFunction } from 'express';
import { AppError, ForbiddenError, UnauthenticatedError } from '../errors';
import type { Identity } from '../types/blog';
import { identityOf, type AuthenticatedRequest } from './auth';
import { flash } from './flash';

export type GuardResult =
  | { allow: true }
  | { allow: false; error: AppError };

/** A check run before a handler body; it sees only the request's identity. */
export type Guard = (identity: Identity) => GuardResult;

const ALLOW: GuardResult = { allow: true };

export function isAdmin(identity: Identity, adminEmail: string): boolean {
  return identity.kind === 'user'
    && identity.user.email.toLowerCase() === adminEmail.toLowerCase();
}

export const requireIdentity: Guard = (identity) =>
  identity.kind === 'user'
    ? ALLOW
    : { allow: false, error: new UnauthenticatedError() };

export function requireAdmin(adminEmail: string): Guard {
  return (identity) =>
    isAdmin(identity, adminEmail)
      ? ALLOW
      : { allow: false, error: new ForbiddenError('Admin access required') };
}

/**
 * Evaluate guards in order; the first denial wins and later guards are not run.
 */
export function runGuards(guards: readonly Guard[], identity: Identity): GuardResult {
  for (const check of guards) {
    const result = check(identity);
    if (!result.allow) {
      return result;
    }
  }
  return ALLOW;
}

/**
 * Route middleware for a guard pipeline. Anonymous visitors are sent to the
 * login page and brought back afterwards; other denials end the request.
 */
export function guard(...guards: Guard[]) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const result = runGuards(guards, identityOf(req));
    if (result.allow) {
      next();
      return;
    }

    if (result.error instanceof UnauthenticatedError) {
      flash(res, result.error.message);
      res.redirect(`/login?next=${encodeURIComponent(req.originalUrl)}`);
      return;
    }
    next(result.error);
  };
}

import express from 'express';
import { fromNodeHeaders } from 'better-auth/node';
import type { NodeEnv } from '../config';
import { AppError, ValidationError } from '../errors';
import type { AuthService } from '../services/authService';
import { ANONYMOUS, type Identity } from '../types/blog';

export interface AuthenticatedRequest extends express.Request {
  identity?: Identity;
}

export function requestHeaders(req: express.Request): Headers {
  return fromNodeHeaders(req.headers);
}

/**
 * Identity of the visitor, as resolved by loadIdentity. Handlers pass it on
 * explicitly to services and guards.
 */
export function identityOf(req: AuthenticatedRequest): Identity {
  return req.identity ?? ANONYMOUS;
}

/**
 * Resolves the session cookie to an identity once per request
 */
export function loadIdentity(authService: AuthService) {
  return async (
    req: AuthenticatedRequest,
    res: express.Response,
    next: express.NextFunction
  ): Promise<void> => {
    try {
      req.identity = await authService.currentIdentity(requestHeaders(req));
      next();
    } catch (error) {
      next(error);
    }
  };
}

// body-parser and other http-errors style failures carry their own 4xx status
function httpStatusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null) {
    const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
    if (typeof status === 'number' && Number.isInteger(status) && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}

/**
 * Error handling middleware
 */
export function errorHandler(nodeEnv: NodeEnv) {
  return (
    err: unknown,
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const status = err instanceof AppError ? err.statusCode : httpStatusOf(err);
    const code = err instanceof AppError
      ? err.code
      : status < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR';
    const message = err instanceof Error && (err instanceof AppError || status < 500 || nodeEnv === 'development')
      ? err.message
      : 'Internal Server Error';

    if (status >= 500) {
      console.error('Error:', err);
    }

    res.status(status).json({
      error: {
        message,
        status,
        code,
        ...(err instanceof ValidationError && { fields: err.fields }),
        ...(nodeEnv === 'development' && err instanceof Error && { stack: err.stack }),
      },
    });
  };
}

/**
 * 404 handler middleware
 */
export function notFoundHandler(
  req: express.Request,
  res: express.Response
): void {
  res.status(404).json({
    error: {
      message: 'Route not found',
      status: 404,
      code: 'NOT_FOUND',
      path: req.path,
      method: req.method,
    },
  });
}

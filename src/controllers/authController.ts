import express from 'express';
import { DuplicateEmailError, InvalidCredentialsError } from '../errors';
import { identityOf, requestHeaders, type AuthenticatedRequest } from '../middleware/auth';
import { flash } from '../middleware/flash';
import type { AuthService } from '../services/authService';
import { loginSchema, registerSchema } from '../validators/auth';
import { parseForm } from '../validators/form';
import { render, viewerOf } from './view';

/**
 * Only local paths are followed after login, so `next` cannot send the
 * visitor to another site.
 */
export function safeRedirectTarget(next: unknown): string {
  if (typeof next === 'string' && next.startsWith('/') && !next.startsWith('//') && !next.startsWith('/\\')) {
    return next;
  }
  return '/';
}

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly adminEmail: string,
  ) {}

  // GET /register
  registerForm(req: AuthenticatedRequest, res: express.Response) {
    render(req, res, viewerOf(identityOf(req), this.adminEmail), {
      form: 'register',
      values: { name: '', email: '' },
    });
  }

  // POST /register
  async register(req: AuthenticatedRequest, res: express.Response, next: express.NextFunction) {
    try {
      const input = parseForm(registerSchema, req.body);
      const { cookies } = await this.authService.register(input, requestHeaders(req));
      res.append('Set-Cookie', cookies);
      res.redirect('/');
    } catch (error) {
      if (error instanceof DuplicateEmailError) {
        flash(res, error.message);
        res.redirect('/login');
        return;
      }
      next(error);
    }
  }

  // GET /login
  loginForm(req: AuthenticatedRequest, res: express.Response) {
    render(req, res, viewerOf(identityOf(req), this.adminEmail), {
      form: 'login',
      values: { email: '' },
    });
  }

  // POST /login
  async login(req: AuthenticatedRequest, res: express.Response, next: express.NextFunction) {
    try {
      const input = parseForm(loginSchema, req.body);
      const { cookies } = await this.authService.login(input, requestHeaders(req));
      res.append('Set-Cookie', cookies);
      res.redirect(safeRedirectTarget(req.query.next));
    } catch (error) {
      if (error instanceof InvalidCredentialsError) {
        flash(res, error.message);
        res.redirect(
          typeof req.query.next === 'string'
            ? `/login?next=${encodeURIComponent(req.query.next)}`
            : '/login'
        );
        return;
      }
      next(error);
    }
  }

  // GET /logout
  async logout(req: AuthenticatedRequest, res: express.Response, next: express.NextFunction) {
    try {
      const cookies = await this.authService.logout(identityOf(req), requestHeaders(req));
      if (cookies.length > 0) {
        res.append('Set-Cookie', cookies);
      }
      res.redirect('/');
    } catch (error) {
      next(error);
    }
  }
}

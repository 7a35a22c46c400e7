import express from 'express';
import { isAdmin } from '../middleware/guards';
import { consumeFlash } from '../middleware/flash';
import type { Identity, Viewer } from '../types/blog';

export function viewerOf(identity: Identity, adminEmail: string): Viewer {
  return identity.kind === 'user'
    ? { loggedIn: true, isAdmin: isAdmin(identity, adminEmail), name: identity.user.name }
    : { loggedIn: false, isAdmin: false, name: null };
}

/**
 * Send a page's view model along with the visitor's state and any pending
 * flash messages.
 */
export function render<T extends object>(
  req: express.Request,
  res: express.Response,
  viewer: Viewer,
  data: T
): void {
  res.json({ ...data, viewer, messages: consumeFlash(req, res) });
}

import express from 'express';
import { z } from 'zod';

export const FLASH_COOKIE = 'flash';

const flashCookieOptions: express.CookieOptions = { httpOnly: true, sameSite: 'lax', path: '/' };
const flashSchema = z.array(z.string());

/**
 * Queue a one-time notice for the next page the visitor loads.
 */
export function flash(res: express.Response, message: string): void {
  res.cookie(FLASH_COOKIE, [message], flashCookieOptions);
}

/**
 * Read and clear the pending notices.
 */
export function consumeFlash(req: express.Request, res: express.Response): string[] {
  const parsed = flashSchema.safeParse(req.cookies?.[FLASH_COOKIE]);
  if (!parsed.success) {
    return [];
  }
  res.clearCookie(FLASH_COOKIE, flashCookieOptions);
  return parsed.data;
}

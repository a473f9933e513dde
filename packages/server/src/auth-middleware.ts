// Asset Registry - Request Identity

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Account } from '@asset-registry/core';

export const CALLER_HEADER = 'x-caller';
export const ADMIN_KEY_HEADER = 'x-admin-api-key';

/**
 * Caller identity of a request, taken from the X-Caller header.
 * Returns null when the header is missing or blank.
 */
export function getCaller(req: Request): Account | null {
  const raw = req.headers[CALLER_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value !== 'string') {
    return null;
  }
  const caller = value.trim();
  return caller.length > 0 ? caller : null;
}

/**
 * Guard for admin routes. An unconfigured key disables them entirely.
 */
export function requireAdminAuth(adminApiKey: string | null): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!adminApiKey) {
      res.status(503).json({ error: 'Admin authentication not configured' });
      return;
    }

    const apiKey = req.headers[ADMIN_KEY_HEADER];
    if (typeof apiKey !== 'string' || apiKey !== adminApiKey) {
      res.status(401).json({ error: 'Unauthorized - Invalid or missing API key' });
      return;
    }

    next();
  };
}

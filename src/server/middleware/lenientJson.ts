import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { errorMessage } from '../../project/errors.js';

const readText = express.text({ type: () => true, limit: '1mb' });

/**
 * Parse a request body as JSON, falling back to an empty object when the
 * body is missing, unparseable or not a JSON object.
 */
export function parseLenientBody(body: unknown): Record<string, unknown> {
  if (typeof body !== 'string' || body.trim() === '') return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return {};
  }
  return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
    ? { ...parsed }
    : {};
}

/**
 * A body that cannot be read (unknown charset, bad Content-Encoding, over
 * the size limit) is treated like one that cannot be parsed.
 */
export function lenientJson(req: Request, res: Response, next: NextFunction) {
  readText(req, res, (err?: unknown) => {
    if (err) {
      console.warn(`[http] Unreadable body on ${req.method} ${req.originalUrl}: ${errorMessage(err)}`);
      req.body = {};
    } else {
      req.body = parseLenientBody(req.body);
    }
    next();
  });
}

import crypto from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { parseList } from '../config/env';

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
}

/** Admin routes: `x-api-key` must be one of the comma-separated keys. */
export function apiKeyAuth(rawKeys: string): RequestHandler {
  const keys = parseList(rawKeys);

  return (req: Request, res: Response, next: NextFunction) => {
    const apiKey = req.header('x-api-key');

    if (!apiKey) {
      res.status(401).json({ success: false, error: 'Missing API key' });
      return;
    }

    if (!keys.some((key) => safeEqual(key, apiKey))) {
      res.status(403).json({ success: false, error: 'Invalid API key' });
      return;
    }

    next();
  };
}

/** Webhook routes: `Authorization: Bearer <secret>`. */
export function webhookAuth(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.header('authorization') ?? '';
    const match = /^Bearer\s+(.+)$/i.exec(header);

    if (!match || !safeEqual(match[1].trim(), secret)) {
      res.status(401).json({ success: false, error: 'Unauthorized' });
      return;
    }

    next();
  };
}

import crypto from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

function safeEqual(a: string, b: string) {
  const left = crypto.createHash('sha256').update(a).digest();
  const right = crypto.createHash('sha256').update(b).digest();
  return crypto.timingSafeEqual(left, right);
}

export function requireApiKey(expectedKey: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const provided = req.header('x-api-key');
    if (!provided) {
      return res.status(401).json({ error: { code: 'API_KEY_REQUIRED', message: 'Missing x-api-key header' } });
    }

    if (!safeEqual(provided, expectedKey)) {
      return res.status(403).json({ error: { code: 'API_KEY_INVALID', message: 'Invalid API key' } });
    }

    return next();
  };
}

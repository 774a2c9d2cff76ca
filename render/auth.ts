import { timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

/**
 * Static bearer-token check. With an empty token every request passes.
 */
export function requireBearerToken(token: string) {
  const expected = Buffer.from(token);

  return (req: Request, res: Response, next: NextFunction) => {
    if (!token) {
      next();
      return;
    }

    const header = req.header('authorization');
    if (!header || !header.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Missing bearer token' });
      return;
    }

    const provided = Buffer.from(header.slice('Bearer '.length));
    if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
      res.status(401).json({ error: 'Invalid bearer token' });
      return;
    }

    next();
  };
}

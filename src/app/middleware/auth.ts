import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Bearer-token guard for operator endpoints.
 * With no token configured every request passes (local dev).
 */
export function makeBearerAuth(expectedToken: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expectedToken) return next();

    const header = req.header('authorization') || '';
    if (header !== `Bearer ${expectedToken}`) {
      res.status(401).json({ error: 'unauthorized' });
      return;
    }
    return next();
  };
}

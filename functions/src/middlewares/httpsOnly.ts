import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Rejects plain-HTTP requests when enforcement is on. Cloud Functions sets
 * x-forwarded-proto; the emulator and local runs may not, so enforcement
 * defaults to production only.
 */
export function requireHttps(
  enforce: boolean = process.env.NODE_ENV === 'production',
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const proto = req.headers['x-forwarded-proto'];
    const forwardedProto = Array.isArray(proto) ? proto[0] : proto;

    if (enforce && forwardedProto !== 'https') {
      res.status(403).json({
        code: 'https_required',
        message: 'HTTPS is required',
      });
      return;
    }
    next();
  };
}

import { Request, Response, NextFunction } from 'express';

/**
 * Express middleware that logs one line per request once the response is sent.
 */
export function requestLogger(service: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      console.log(`[${service}] ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - start}ms`);
    });
    next();
  };
}

import { Request, Response, NextFunction } from 'express';
import { log } from '../shared/logger';
import '../shared/types';

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    log({
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      responseTime: Number(process.hrtime.bigint() - start) / 1e6,
      requestId: req.id,
    });
  });

  next();
}

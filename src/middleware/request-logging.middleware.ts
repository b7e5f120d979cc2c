import type { NextFunction, Request, Response } from 'express';
import { logger } from '../utils/logger';
import { getTraceId } from './trace-id.middleware';

export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    logger.info('http:finish', {
      requestId: getTraceId(res),
      method: req.method,
      route: req.path,
      statusCode: res.statusCode,
      durationMs: Math.round(durationMs),
    });
  });

  next();
}

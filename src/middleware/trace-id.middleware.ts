import { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';

const HEADER_NAME = 'X-Trace-Id';

export function traceIdMiddleware(req: Request, res: Response, next: NextFunction) {
  const incoming = req.get('x-trace-id');
  const traceId = (incoming && incoming.trim()) || randomUUID();

  res.locals.traceId = traceId;
  res.setHeader(HEADER_NAME, traceId);
  next();
}

export function getTraceId(res: Response): string | undefined {
  const traceId: unknown = res.locals.traceId;
  return typeof traceId === 'string' ? traceId : undefined;
}

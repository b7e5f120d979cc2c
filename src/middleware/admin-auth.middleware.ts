import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { createHash, timingSafeEqual } from 'crypto';
import { ErrorCodes, fail } from '../utils/api-response';
import { logger } from '../utils/logger';

function digest(value: string): Buffer {
  // Equal-length buffers for timingSafeEqual whatever the token length
  return createHash('sha256').update(value).digest();
}

/**
 * Bearer-token guard for the retention admin routes. Without a configured token the
 * routes are switched off rather than left open.
 */
export function requireAdminToken(expected: string | undefined): RequestHandler {
  const expectedDigest = expected ? digest(expected) : null;

  return (req: Request, res: Response, next: NextFunction) => {
    if (!expectedDigest) {
      fail(res, ErrorCodes.SERVICE_UNAVAILABLE, 'Admin API is disabled', 503);
      return;
    }
    const header = req.get('authorization');
    if (!header || !header.startsWith('Bearer ')) {
      fail(res, ErrorCodes.AUTHENTICATION_ERROR, 'No valid authorization token provided', 401);
      return;
    }
    if (!timingSafeEqual(digest(header.substring(7)), expectedDigest)) {
      logger.warn('retention.admin.auth_rejected', { route: req.path });
      fail(res, ErrorCodes.AUTHENTICATION_ERROR, 'Invalid token', 401);
      return;
    }
    next();
  };
}

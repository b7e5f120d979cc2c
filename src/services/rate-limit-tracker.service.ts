import { logger } from '../utils/logger';
import { retentionMetrics } from '../metrics/retention.metrics';

/** Anything with a case-insensitive `get`, e.g. a fetch `Headers` instance. */
export interface RateLimitHeaderSource {
  get(name: string): string | null;
}

export const RATE_LIMIT_HEADERS = {
  remaining: 'x-ratelimit-remaining',
  limit: 'x-ratelimit-limit',
  resetAfter: 'x-ratelimit-reset-after',
} as const;

function parseCount(raw: string): number | undefined {
  const trimmed = raw.trim();
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : undefined;
}

function parseSeconds(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Pause applied before every delete-class request, learned from the rate-limit headers
 * of delete responses. Once a response reports no remaining calls, the reset window is
 * assumed to be spread evenly over the bucket: `resetAfter / limit` seconds per call.
 */
export class RateLimitTracker {
  private delaySeconds = 0;

  get currentDelaySeconds(): number {
    return this.delaySeconds;
  }

  get currentDelayMs(): number {
    return Math.round(this.delaySeconds * 1000);
  }

  /** Back to no pause; called at the start of every scan cycle. */
  reset(): void {
    this.delaySeconds = 0;
    retentionMetrics.setPacingDelay(0);
  }

  /**
   * Returns the new delay when the response changed it, otherwise `undefined`.
   */
  observe(headers: RateLimitHeaderSource): number | undefined {
    const rawRemaining = headers.get(RATE_LIMIT_HEADERS.remaining);
    if (rawRemaining == null) {
      logger.warn('retention.rate_limit.headers_missing');
      return undefined;
    }
    const remaining = parseCount(rawRemaining);
    if (remaining === undefined) {
      this.warnMalformed(headers);
      return undefined;
    }
    if (remaining !== 0) return undefined;

    const rawLimit = headers.get(RATE_LIMIT_HEADERS.limit);
    const rawResetAfter = headers.get(RATE_LIMIT_HEADERS.resetAfter);
    if (rawLimit == null || rawResetAfter == null) {
      logger.warn('retention.rate_limit.headers_missing', { remaining });
      return undefined;
    }
    const limit = parseCount(rawLimit);
    const resetAfter = parseSeconds(rawResetAfter);
    if (limit === undefined || resetAfter === undefined) {
      this.warnMalformed(headers);
      return undefined;
    }
    if (limit === 0) {
      logger.warn('retention.rate_limit.zero_limit', { resetAfter });
      return undefined;
    }

    this.delaySeconds = resetAfter / limit;
    retentionMetrics.setPacingDelay(this.delaySeconds);
    logger.info('retention.rate_limit.updated', { delaySeconds: this.delaySeconds, limit, resetAfter });
    return this.delaySeconds;
  }

  private warnMalformed(headers: RateLimitHeaderSource): void {
    logger.warn('retention.rate_limit.headers_malformed', {
      remaining: headers.get(RATE_LIMIT_HEADERS.remaining),
      limit: headers.get(RATE_LIMIT_HEADERS.limit),
      resetAfter: headers.get(RATE_LIMIT_HEADERS.resetAfter),
    });
  }
}

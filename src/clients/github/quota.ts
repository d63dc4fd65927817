// src/clients/github/quota.ts

import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { QuotaExceededError } from '../../utils/errors';
import { sleep } from '../../utils/sleep';
import { addSpanEvent } from '../../observability/tracing';

// x-ratelimit-reset has one-second resolution
const RESET_MARGIN_MS = 1000;

/**
 * Sleep until the GitHub quota refills if that is within `maxWaitMs`.
 *
 * @returns true after waiting, false when the caller should stop instead
 */
export async function waitForQuota(
  error: QuotaExceededError,
  maxWaitMs: number,
  logger: Logger,
  metrics: MetricsCollector,
  signal?: AbortSignal
): Promise<boolean> {
  const waitMs = error.resetAt
    ? Math.max(0, error.resetAt.getTime() - Date.now()) + RESET_MARGIN_MS
    : Number.POSITIVE_INFINITY;

  if (waitMs > maxWaitMs) {
    logger.warn('GitHub quota exhausted, stopping', {
      resetAt: error.resetAt?.toISOString(),
      maxWaitMs,
    });
    return false;
  }

  metrics.incrementCounter('quota_pauses', { provider: 'github' });
  logger.warn('GitHub quota exhausted, pausing until reset', {
    resetAt: error.resetAt?.toISOString(),
    waitMs,
  });
  addSpanEvent('quota.pause', { waitMs });
  await sleep(waitMs, signal);
  return true;
}

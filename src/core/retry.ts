/**
 * Bounded, sequential retry for reads that see transient provider blips.
 * No backoff: a failed attempt is followed immediately by the next one.
 */

import { RequestExhaustedError, errorMessage, isRetryable } from "./errors.js";
import type { Logger } from "./logger.js";
import { gatewayRetryCounter } from "./metrics.js";

export interface RetryOptions {
  /** Operation name for logs and metrics. */
  operation: string;
  /** Identifier of the requested entity, reported on exhaustion. */
  entityId: string;
  maxAttempts: number;
  logger: Logger;
}

/**
 * Run `attempt` until it yields a non-empty result or `maxAttempts` is used up.
 * Failures tagged retryable use up one attempt; anything else propagates at once.
 */
export async function executeWithRetry<T>(
  attempt: () => Promise<T | null | undefined>,
  options: RetryOptions
): Promise<T> {
  const { operation, entityId, maxAttempts, logger } = options;
  let lastError: unknown;

  for (let attemptNumber = 1; attemptNumber <= maxAttempts; attemptNumber++) {
    try {
      const result = await attempt();
      if (result != null) return result;
      lastError = undefined;
      logger.warn({ operation, entityId, attempt: attemptNumber, maxAttempts }, "Empty response from provider");
    } catch (err) {
      if (!isRetryable(err)) throw err;
      lastError = err;
      logger.warn(
        { operation, entityId, attempt: attemptNumber, maxAttempts, err: errorMessage(err) },
        `Got network error on attempt ${attemptNumber}`
      );
    }
    if (attemptNumber < maxAttempts) {
      gatewayRetryCounter.inc({ operation });
    }
  }

  throw new RequestExhaustedError(entityId, maxAttempts, lastError);
}

/**
 * Retry with Exponential Backoff
 *
 * Generic retry utility for whole operations. The orchestrator wraps
 * controller runs with it; inside a run only the login loop retries.
 *
 * An attempt fails when it throws or when `isFailure` flags its result.
 * The final attempt's result is returned as-is; the final attempt's error
 * is rethrown.
 */
import { logger } from "../../monitoring/logger";
import { errorMessage } from "../errors/scrape.errors";

export interface RetryOptions<T> {
  /** Maximum number of attempts (including the first) */
  maxAttempts: number;
  /** Initial delay in milliseconds before first retry */
  initialDelayMs: number;
  /** Multiply delay by this factor on each retry (default: 2) */
  backoffFactor?: number;
  /** Optional label for log messages */
  label?: string;
  /** Treat a resolved value as a failed attempt */
  isFailure?: (result: T) => boolean;
  /** Jitter ratio applied to each delay (default: 0.2) */
  jitter?: number;
}

export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions<T>
): Promise<T> {
  const {
    maxAttempts,
    initialDelayMs,
    backoffFactor = 2,
    label = "operation",
    isFailure,
    jitter = 0.2,
  } = options;
  const attempts = Math.max(1, maxAttempts);

  for (let attempt = 1; ; attempt++) {
    const isLast = attempt >= attempts;
    let failure: string;

    try {
      const result = await fn(attempt);
      if (!isFailure || !isFailure(result)) return result;
      if (isLast) {
        logger.error({ attempt, maxAttempts: attempts, label }, `${label} failed after ${attempts} attempts`);
        return result;
      }
      failure = "unsuccessful result";
    } catch (error) {
      if (isLast) {
        logger.error(
          { attempt, maxAttempts: attempts, error: errorMessage(error), label },
          `${label} failed after ${attempts} attempts`
        );
        throw error;
      }
      failure = errorMessage(error);
    }

    const actualDelay = backoffDelay(initialDelayMs, backoffFactor, attempt, jitter);

    logger.warn(
      { attempt, maxAttempts: attempts, delay: actualDelay, error: failure, label },
      `${label} attempt ${attempt} failed, retrying in ${actualDelay}ms`
    );

    await sleep(actualDelay);
  }
}

/** Delay before the retry that follows `attempt` (1-based), with ±jitter */
export function backoffDelay(
  initialDelayMs: number,
  backoffFactor: number,
  attempt: number,
  jitter: number
): number {
  const delay = initialDelayMs * Math.pow(backoffFactor, attempt - 1);
  const offset = delay * jitter * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(delay + offset));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

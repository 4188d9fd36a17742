/**
 * Deadline helpers for bounded waits.
 */

export const TIMED_OUT: unique symbol = Symbol("timed-out");

/**
 * Settle with the promise's value, or with TIMED_OUT once `timeoutMs`
 * elapses. The promise is abandoned, not cancelled; rejections that
 * arrive after the deadline are absorbed.
 */
export async function withDeadline<T>(
  promise: Promise<T>,
  timeoutMs: number
): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });

  // A late rejection must not surface as unhandled
  promise.catch(() => undefined);

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

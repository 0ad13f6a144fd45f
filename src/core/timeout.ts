/**
 * Timeout guard: bounds one unit of provider work by a deadline.
 *
 * The work is raced against a timer. When the timer wins the caller gets a
 * TimeoutError and the work is abandoned, not cancelled; whatever it does
 * afterwards belongs to the provider.
 */

import { TimeoutError } from "./errors.js";

export type Guard = <T>(operation: string, work: () => Promise<T>) => Promise<T>;

export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  work: () => Promise<T>
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work(), deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Guard with a fixed deadline, shared by everything a gateway calls. */
export function createGuard(timeoutMs: number): Guard {
  return (operation, work) => withTimeout(operation, timeoutMs, work);
}

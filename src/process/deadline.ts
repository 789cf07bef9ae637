import { ExecutionTimeoutError } from "../errors.js";

/**
 * Race `promise` against a timer. On expiry the returned promise rejects with
 * ExecutionTimeoutError; `promise` itself is left alone.
 */
export function withDeadline<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ExecutionTimeoutError(timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, expiry]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

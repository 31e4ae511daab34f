/**
 * @lexledger/ledger: Timeouts.
 */

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number, label: string) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Settle with `work`, or reject with TimeoutError after `timeoutMs`.
 *
 * `onTimeout` runs when the time is up and returns whether to reject
 * now. Returning false leaves the outcome to `work`, for operations
 * that cannot be abandoned halfway. After a rejection the eventual
 * result of `work` is ignored.
 */
export function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  label: string,
  onTimeout: () => boolean = () => true,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      if (onTimeout()) {
        reject(new TimeoutError(timeoutMs, label));
      }
    }, timeoutMs);
  });

  return Promise.race([work, expired]).finally(() => {
    clearTimeout(timer);
  });
}

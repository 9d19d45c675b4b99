import { UploadError, toErrorMessage } from "../errors.js";

export const MAX_UPLOAD_ATTEMPTS = 6;

export type UploadFailure = {
  attempt: number;
  err: unknown;
  // undefined once the attempt budget is spent
  waitMs?: number;
};

export type BackoffOptions = {
  unitMs: number;
  sleep: (ms: number) => Promise<void>;
  onAttempt?: (attempt: number) => void;
  onFailure?: (failure: UploadFailure) => void;
};

/**
 * 2^failures units: 2, 4, 8, 16, 32 for the first five failures.
 */
export function backoffDelayMs(failures: number, unitMs: number): number {
  return 2 ** failures * unitMs;
}

/**
 * Runs `send` until it resolves or has failed MAX_UPLOAD_ATTEMPTS times.
 * Resolves with the number of attempts used.
 */
export async function sendWithBackoff(
  send: (attempt: number) => Promise<void>,
  options: BackoffOptions,
): Promise<number> {
  let failures = 0;
  for (;;) {
    const attempt = failures + 1;
    options.onAttempt?.(attempt);
    try {
      await send(attempt);
      return attempt;
    } catch (err) {
      failures += 1;
      if (failures >= MAX_UPLOAD_ATTEMPTS) {
        options.onFailure?.({ attempt, err });
        throw new UploadError(
          `upload_gave_up_after_${failures}_attempts:${toErrorMessage(err)}`,
          failures,
          err instanceof UploadError ? err.status : undefined,
          { cause: err },
        );
      }
      const waitMs = backoffDelayMs(failures, options.unitMs);
      options.onFailure?.({ attempt, err, waitMs });
      await options.sleep(waitMs);
    }
  }
}

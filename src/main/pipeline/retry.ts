/**
 * Bounded retry with a success predicate.
 *
 * An attempt fails when the operation throws or when `validate` rejects its
 * value (e.g. exit status 0 but no output file). The outcome is returned,
 * not thrown, so each call site decides whether exhaustion is fatal.
 */

export interface AttemptFailure {
  attempt: number;
  attempts: number;
  reason: string;
}

export interface RetryOptions<T> {
  attempts: number;
  validate: (value: T, attempt: number) => boolean | Promise<boolean>;
  /** Explains why a value failed validation */
  describeInvalid?: (value: T) => string;
  onAttemptFailed?: (failure: AttemptFailure) => void;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; attempts: number; reason: string; error?: unknown };

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions<T>,
): Promise<RetryOutcome<T>> {
  if (!Number.isInteger(options.attempts) || options.attempts < 1) {
    throw new RangeError(`attempts must be a positive integer, got ${options.attempts}`);
  }

  let reason = 'not attempted';
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      const value = await operation(attempt);
      if (await options.validate(value, attempt)) {
        return { ok: true, value, attempts: attempt };
      }
      reason = options.describeInvalid?.(value) ?? 'result failed validation';
      lastError = undefined;
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error);
      lastError = error;
    }
    options.onAttemptFailed?.({ attempt, attempts: options.attempts, reason });
  }

  return { ok: false, attempts: options.attempts, reason, error: lastError };
}

/**
 * errors.ts - Error taxonomy for the tapecut pipeline
 *
 * Every error carries a severity so the CLI can map it to an exit code
 * (user mistakes exit 1, everything else exits 2), plus the operation and
 * target it happened on for log lines and the final summary.
 */

// ============================================================================
// Types
// ============================================================================

export type ErrorSeverity = 'user' | 'system';

export interface ErrorContext {
  operation: string;
  target?: string;
  attempt?: number;
}

// ============================================================================
// Base class
// ============================================================================

export class TapecutError extends Error {
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext | undefined;

  constructor(message: string, severity: ErrorSeverity, context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TapecutError';
    this.severity = severity;
    this.context = context;
  }
}

// ============================================================================
// Taxonomy
// ============================================================================

/** Bad arguments or paths. Fatal, immediate exit. */
export class UsageError extends TapecutError {
  constructor(message: string) {
    super(message, 'user', { operation: 'usage' });
    this.name = 'UsageError';
  }
}

/** Metadata read failed. Callers fall back to conservative defaults. */
export class ProbeError extends TapecutError {
  constructor(message: string, target: string, options?: { cause?: unknown }) {
    super(message, 'system', { operation: 'probe', target }, options);
    this.name = 'ProbeError';
  }
}

/** Frame source unreadable. Segmentation returns nothing. */
export class DecodeError extends TapecutError {
  constructor(message: string, target: string, options?: { cause?: unknown }) {
    super(message, 'system', { operation: 'decode', target }, options);
    this.name = 'DecodeError';
  }
}

/** Lossless range extraction failed; the rest of the batch is not attempted. */
export class ExtractionError extends TapecutError {
  public readonly segmentIndex: number;

  constructor(message: string, target: string, segmentIndex: number) {
    super(message, 'system', { operation: 'extract', target });
    this.name = 'ExtractionError';
    this.segmentIndex = segmentIndex;
  }
}

/** Lossless concatenation of a folder failed. */
export class ConcatError extends TapecutError {
  constructor(message: string, target: string) {
    super(message, 'system', { operation: 'concat', target });
    this.name = 'ConcatError';
  }
}

/** Delivery encode failed after every allowed attempt. */
export class TranscodeError extends TapecutError {
  public readonly attempts: number;

  constructor(message: string, target: string, attempts: number, options?: { cause?: unknown }) {
    super(message, 'system', { operation: 'transcode', target, attempt: attempts }, options);
    this.name = 'TranscodeError';
    this.attempts = attempts;
  }
}

/** Persisted state holds something unrecognized. Needs the operator. */
export class StateCorruptionError extends TapecutError {
  constructor(message: string, target: string, options?: { cause?: unknown }) {
    super(message, 'system', { operation: 'load-state', target }, options);
    this.name = 'StateCorruptionError';
  }
}

/** Delivered outputs missing or empty after the final stage. */
export class VerificationError extends TapecutError {
  public readonly missing: string[];

  constructor(message: string, target: string, missing: string[]) {
    super(message, 'system', { operation: 'verify', target });
    this.name = 'VerificationError';
    this.missing = missing;
  }
}

/** Another live run owns the scratch directory for this stem. */
export class LockedError extends TapecutError {
  constructor(message: string, target: string) {
    super(message, 'user', { operation: 'lock', target });
    this.name = 'LockedError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * One-line rendering with operation, target and attempt when known.
 */
export function describeError(error: unknown): string {
  if (error instanceof TapecutError && error.context) {
    const { operation, target, attempt } = error.context;
    const parts = [`[${operation}]`];
    if (target) parts.push(target);
    if (attempt !== undefined) parts.push(`(attempt ${attempt})`);
    return `${parts.join(' ')}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export function isUserError(error: unknown): boolean {
  return error instanceof TapecutError && error.severity === 'user';
}

import type { ObjectRef } from '@/interfaces/object-ref.interface';

export type ErrorKind = 'NotFound' | 'ValidationError' | 'ConflictError' | 'RenderError' | 'TransientIOError' | 'Fatal';

export type RenderErrorReason = 'NotFound' | 'ParseError' | 'PatchConflict';

export abstract class DriftlessError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Conflict and transient failures are retried locally; everything else surfaces immediately. */
  get retryable(): boolean {
    return false;
  }
}

export class NotFoundError extends DriftlessError {
  readonly kind = 'NotFound';

  constructor(
    message: string,
    readonly ref?: ObjectRef,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ValidationError extends DriftlessError {
  readonly kind = 'ValidationError';

  constructor(
    message: string,
    readonly issues: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ConflictError extends DriftlessError {
  readonly kind = 'ConflictError';

  constructor(
    message: string,
    readonly ref?: ObjectRef,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  override get retryable(): boolean {
    return true;
  }
}

export class RenderError extends DriftlessError {
  readonly kind = 'RenderError';

  constructor(
    readonly reason: RenderErrorReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class TransientIOError extends DriftlessError {
  readonly kind = 'TransientIOError';

  override get retryable(): boolean {
    return true;
  }
}

export class FatalError extends DriftlessError {
  readonly kind = 'Fatal';
}

export const isDriftlessError = (err: unknown): err is DriftlessError => err instanceof DriftlessError;

export const isRetryable = (err: unknown): boolean => isDriftlessError(err) && err.retryable;

/** Anything that is not already classified is treated as an I/O hiccup. */
export const toDriftlessError = (err: unknown): DriftlessError => {
  if (isDriftlessError(err)) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TransientIOError(message, { cause: err });
};

export const describeError = (err: unknown): { kind: ErrorKind; message: string } => {
  const error = toDriftlessError(err);
  const message = error instanceof RenderError ? `${error.reason}: ${error.message}` : error.message;
  return { kind: error.kind, message };
};

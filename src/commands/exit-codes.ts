import { ConflictError, describeError, NotFoundError, ValidationError } from '@/errors/driftless.errors';

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  USER_ERROR: 1,
  SYNC_FAILED: 2,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export type CommandResult =
  | { ok: true; lines: string[] }
  | { ok: false; exitCode: ExitCode; error: string; lines?: string[] };

/** Unknown names, malformed input and name clashes are the caller's to fix. */
export const exitCodeFor = (err: unknown): ExitCode =>
  err instanceof NotFoundError || err instanceof ValidationError || err instanceof ConflictError
    ? EXIT.USER_ERROR
    : EXIT.SYNC_FAILED;

/** `<kind>: <message>`, as printed for every failed command. */
export const failure = (err: unknown, exitCode: ExitCode = exitCodeFor(err), lines?: string[]): CommandResult => {
  const { kind, message } = describeError(err);
  return { ok: false, exitCode, error: `${kind}: ${message}`, lines };
};

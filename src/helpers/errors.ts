/**
 * Error type shared by every stage of a tracker run.
 * Components throw it; only the entry point turns it into an exit code.
 *
 * @module helpers/errors
 */

export type TrackerErrorKind =
  | 'configuration'
  | 'authentication'
  | 'upstream'
  | 'membership'
  | 'interrupted'
  | 'output';

/** Exit code for any fatal failure */
export const FATAL_EXIT_CODE = 2;

export class TrackerError extends Error {
  constructor(
    message: string,
    public readonly kind: TrackerErrorKind,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TrackerError';
  }

  get exitCode(): number {
    return FATAL_EXIT_CODE;
  }
}

/**
 * Wraps an unknown failure from an upstream call, keeping a TrackerError as is.
 */
export const toUpstreamError = (error: unknown, context: string): TrackerError => {
  if (error instanceof TrackerError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TrackerError(`${context}: ${message}`, 'upstream', undefined, { cause: error });
};

/**
 * Error types raised while loading and extracting an archive.
 */

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Raised when the command line does not name a directory file and an archive.
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

/**
 * Raised when a file cannot be opened, read, written or is shorter than required.
 */
export class IoError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'IoError';
  }
}

/**
 * Raised when a directory file's size does not fit its record width.
 */
export class InvalidFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFormatError';
  }
}

/**
 * Failure of one extraction step, tagged with what was being done
 * (a load phase or the output path of the record).
 */
export class ExtractError extends Error {
  constructor(public readonly context: string, public readonly cause: unknown) {
    super(`${context}: ${describeCause(cause)}`);
    this.name = 'ExtractError';
  }
}

/**
 * Wraps a Node.js filesystem failure into an IoError, leaving our own errors untouched.
 */
export function toIoError(error: unknown, action: string): Error {
  if (error instanceof IoError || error instanceof InvalidFormatError) {
    return error;
  }
  return new IoError(`${action}: ${describeCause(error)}`, error);
}

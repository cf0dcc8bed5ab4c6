/**
 * A path could not be read or written. Fatal for the run; operations raise it
 * before their first write.
 */
export class IoFailureError extends Error {
  readonly path: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IoFailureError';
    this.path = filePath;
  }
}

/** A file was read but its content does not have the expected shape. */
export class DocumentFormatError extends IoFailureError {
  readonly problems: string[];

  constructor(filePath: string, problems: string[], options?: { cause?: unknown }) {
    super(`Invalid document ${filePath}: ${problems.join('; ')}`, filePath, options);
    this.name = 'DocumentFormatError';
    this.problems = problems;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

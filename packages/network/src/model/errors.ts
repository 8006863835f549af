/**
 * Model persistence errors
 */

export interface FormatIssue {
  path: string;
  message: string;
}

export class ModelFormatError extends Error {
  constructor(
    message: string,
    public readonly issues: FormatIssue[],
    public readonly source?: string
  ) {
    super(message);
    this.name = 'ModelFormatError';
    Object.setPrototypeOf(this, ModelFormatError.prototype);
  }
}

export class ModelIOError extends Error {
  /** errno code of the underlying fs error, e.g. ENOENT */
  public readonly code?: string;

  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ModelIOError';
    this.code = errorCode(cause);
    Object.setPrototypeOf(this, ModelIOError.prototype);
  }
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

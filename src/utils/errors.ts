/**
 * Raised by the page fetcher once every attempt to download a rates page has failed.
 */
export class FetchError extends Error {
  readonly url: string;
  readonly attempts: number;

  constructor(message: string, url: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
    this.url = url;
    this.attempts = attempts;
  }
}

/**
 * Error carrying an HTTP status and a machine-readable code for API responses.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, statusCode = 500, code = 'INTERNAL_ERROR', details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

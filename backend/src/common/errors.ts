/**
 * APPLICATION ERRORS
 * ==================
 *
 * Every error the service raises on purpose carries a stable code and the
 * HTTP status the global error handler answers with.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * Malformed type spec or invalid default. Raised while building an option
 * schema at startup; the process must not serve with that schema.
 */
export class SchemaError extends AppError {
  constructor(message: string) {
    super('SCHEMA_ERROR', message, 500);
    this.name = 'SchemaError';
  }
}

/**
 * Unknown option, malformed or out-of-range value.
 */
export class OptionValueError extends AppError {
  constructor(message: string) {
    super('INVALID_OPTION', message, 400);
    this.name = 'OptionValueError';
  }
}

export class FetchError extends AppError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super('FETCH_ERROR', message, 502, options);
    this.name = 'FetchError';
    this.url = url;
  }
}

export class CacheIoError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CACHE_IO_ERROR', message, 500, options);
    this.name = 'CacheIoError';
  }
}

export class UpstreamError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPSTREAM_ERROR', message, 502, options);
    this.name = 'UpstreamError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Application errors.
 * Every error carries a stable code and the HTTP status the API maps it to.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', message, 404, details);
  }
}

export class ConflictError extends AppError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, 409, details);
  }
}

// ── Crawl errors ──

/** Connection, network or file-open failure. Never retried automatically. */
export class SourceUnreachableError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SOURCE_UNREACHABLE', message, 502, details);
  }
}

/** The source answered, but its content could not be understood. */
export class SourceMalformedError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SOURCE_MALFORMED', message, 422, details);
  }
}

/** A single field descriptor was unusable. Skipped and counted. */
export class FieldRejectedError extends AppError {
  constructor(
    readonly fieldName: string,
    readonly reason: string
  ) {
    super('FIELD_REJECTED', `Field "${fieldName}" rejected: ${reason}`, 400, {
      field: fieldName,
      reason,
    });
  }
}

export class ConcurrentCrawlError extends ConflictError {
  constructor(sourceId: string) {
    super('CRAWL_IN_PROGRESS', `A crawl is already in progress for "${sourceId}"`, {
      sourceId,
    });
  }
}

/** Abort reason handed to adapters when the caller cancels a crawl. */
export class CrawlCancelledError extends AppError {
  constructor(sourceId: string) {
    super('CRAWL_CANCELLED', `Crawl of "${sourceId}" was cancelled`, 409, { sourceId });
  }
}

/** The catalog could not apply a write. The only fatal crawl condition. */
export class CatalogWriteError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('CATALOG_WRITE_FAILED', message, 500);
    this.cause = cause;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

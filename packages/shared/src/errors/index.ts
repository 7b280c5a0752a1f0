export interface ErrorResponse {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface DocumentContext {
  documentId: string;
  lastStableState: string;
}

/**
 * Base class for every error the workflow raises on purpose. `code` is the
 * stable identifier callers switch on; the message is for humans.
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  readonly retryable: boolean = false;
  readonly cause?: Error;
  document?: DocumentContext;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = new.target.name;
    this.cause = cause;
  }

  forDocument(documentId: string, lastStableState: string): this {
    this.document = { documentId, lastStableState };
    return this;
  }

  toResponse(): ErrorResponse {
    return {
      code: this.code,
      message: this.message,
      details: this.document ? { ...this.document } : undefined,
    };
  }
}

// Caller input

export class TemplateInputError extends AppError {
  readonly code = 'TEMPLATE_INPUT_ERROR';

  constructor(message: string, readonly missing: string[] = []) {
    super(message);
  }

  toResponse(): ErrorResponse {
    const base = super.toResponse();
    return this.missing.length > 0 ? { ...base, details: { ...base.details, missing: this.missing } } : base;
  }
}

export class UnknownRoleError extends AppError {
  readonly code = 'UNKNOWN_ROLE';

  constructor(readonly role: string) {
    super(`Unknown role: ${role}`);
  }
}

export class InvalidQueryError extends AppError {
  readonly code = 'INVALID_QUERY';
}

export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND';
}

export class InvalidTransitionError extends AppError {
  readonly code = 'INVALID_TRANSITION';
}

// Transient adapter failures

export class GenerationUnavailable extends AppError {
  readonly code = 'GENERATION_UNAVAILABLE';
  readonly retryable = true;
}

export class SignatureUnavailable extends AppError {
  readonly code = 'SIGNATURE_UNAVAILABLE';
  readonly retryable = true;
}

export class IndexUnavailable extends AppError {
  readonly code = 'INDEX_UNAVAILABLE';
  readonly retryable = true;
}

export class RetriesExhausted extends AppError {
  readonly code = 'RETRIES_EXHAUSTED';

  constructor(readonly operation: string, readonly attempts: number, cause: Error) {
    super(`${operation} failed after ${attempts} attempts: ${cause.message}`, cause);
  }
}

// Permanent adapter failures

export class ProviderRejected extends AppError {
  readonly code = 'PROVIDER_REJECTED';
}

export class InternalError extends AppError {
  readonly code = 'INTERNAL_ERROR';
}

// Content

export class RenderError extends AppError {
  readonly code = 'RENDER_ERROR';
}

// Concurrency

export class ConflictError extends AppError {
  readonly code = 'CONFLICT';

  constructor(readonly recordId: string, readonly expectedVersion: number) {
    super(`Record ${recordId} was modified since version ${expectedVersion}`);
  }
}

export class ConcurrentUpdateError extends AppError {
  readonly code = 'CONCURRENT_UPDATE';

  constructor(readonly recordId: string, readonly attempts: number, cause: Error) {
    super(`Record ${recordId} kept changing underneath ${attempts} update attempts`, cause);
  }
}

/** Passes AppErrors through and wraps anything else as an InternalError. */
export const asAppError = (error: unknown): AppError => {
  if (error instanceof AppError) return error;
  const cause = toError(error);
  return new InternalError(cause.message, cause);
};

export const isRetryable = (error: unknown): boolean => error instanceof AppError && error.retryable;

export const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));

import { HttpException, HttpStatus, ValidationError } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ApiResponse, AppError, Logger, asAppError } from '@contractflow/shared';

export type RequestHeaders = Record<string, string | string[] | undefined>;

export function getCorrelationId(headers: RequestHeaders): string {
  const cid = headers['x-correlation-id'];
  if (typeof cid === 'string' && cid.length > 0) return cid;
  return uuidv4();
}

const STATUS_BY_CODE: Record<string, HttpStatus> = {
  TEMPLATE_INPUT_ERROR: HttpStatus.BAD_REQUEST,
  UNKNOWN_ROLE: HttpStatus.BAD_REQUEST,
  INVALID_QUERY: HttpStatus.BAD_REQUEST,
  VALIDATION_ERROR: HttpStatus.BAD_REQUEST,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  INVALID_TRANSITION: HttpStatus.CONFLICT,
  CONFLICT: HttpStatus.CONFLICT,
  CONCURRENT_UPDATE: HttpStatus.CONFLICT,
  GENERATION_UNAVAILABLE: HttpStatus.BAD_GATEWAY,
  SIGNATURE_UNAVAILABLE: HttpStatus.BAD_GATEWAY,
  INDEX_UNAVAILABLE: HttpStatus.BAD_GATEWAY,
  RETRIES_EXHAUSTED: HttpStatus.BAD_GATEWAY,
  PROVIDER_REJECTED: HttpStatus.BAD_GATEWAY,
  RENDER_ERROR: HttpStatus.UNPROCESSABLE_ENTITY,
};

export const httpStatusFor = (error: AppError): HttpStatus =>
  STATUS_BY_CODE[error.code] || HttpStatus.INTERNAL_SERVER_ERROR;

export const ok = <T>(data: T, correlationId: string): ApiResponse<T> => ({
  success: true,
  data,
  correlationId,
});

/**
 * Converts whatever a handler threw into the response envelope, carried by
 * an HttpException so Nest sets the status code.
 */
export function failure(err: unknown, correlationId: string, logger: Logger): HttpException {
  const error = asAppError(err);
  const status = httpStatusFor(error);
  if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
    logger.error('Request failed', error, { code: error.code, correlationId });
  }

  const body: ApiResponse<never> = { success: false, error: error.toResponse(), correlationId };
  return new HttpException(body, status);
}

const flatten = (errors: ValidationError[]): string[] =>
  errors.flatMap((e) => [...Object.values(e.constraints || {}), ...flatten(e.children || [])]);

/** ValidationPipe exceptionFactory producing the same envelope as handlers. */
export function validationFailure(errors: ValidationError[]): HttpException {
  const body: ApiResponse<never> = {
    success: false,
    error: {
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details: { violations: flatten(errors) },
    },
    correlationId: uuidv4(),
  };
  return new HttpException(body, HttpStatus.BAD_REQUEST);
}

/**
 * Standard JSON error / success bodies for the HTTP API.
 */
import type { ZodIssue } from 'zod';

export type ErrorCode =
  | 'bad_request'
  | 'image_unavailable'
  | 'invalid_image'
  | 'not_found'
  | 'request_timeout'
  | 'internal_error';

export interface FieldError {
  path: string;
  message: string;
}

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: FieldError[];
  code?: ErrorCode;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export function createErrorResponse(message: string, errors?: FieldError[], code?: ErrorCode): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 && { errors }),
    ...(code && { code }),
  };
}

export function createSuccessResponse<T>(data: T): SuccessResponse<T> {
  return {
    success: true,
    data,
  };
}

export function fieldErrorsFromZod(issues: ZodIssue[]): FieldError[] {
  return issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
}

/**
 * Operation Result
 *
 * Core operations (template store, renderer, dispatcher) return an
 * OperationResult instead of throwing. Only the HTTP layer turns a failed
 * result into a status code, via unwrapResult().
 */
import {
  BadRequestException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';

export type OperationErrorKind = 'bad_request' | 'not_found' | 'internal';

export interface OperationError {
  kind: OperationErrorKind;
  message: string;
}

export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: OperationError };

export function ok<T>(value: T): OperationResult<T> {
  return { ok: true, value };
}

export function badRequest<T = never>(message: string): OperationResult<T> {
  return { ok: false, error: { kind: 'bad_request', message } };
}

export function notFound<T = never>(message: string): OperationResult<T> {
  return { ok: false, error: { kind: 'not_found', message } };
}

export function internal<T = never>(message: string): OperationResult<T> {
  return { ok: false, error: { kind: 'internal', message } };
}

/**
 * Map an operation error to the NestJS exception for its status code
 */
export function toHttpException(error: OperationError): HttpException {
  switch (error.kind) {
    case 'bad_request':
      return new BadRequestException(error.message);
    case 'not_found':
      return new NotFoundException(error.message);
    case 'internal':
      return new InternalServerErrorException(error.message);
  }
}

/**
 * Return the value of a successful result, or throw the matching HTTP exception
 */
export function unwrapResult<T>(result: OperationResult<T>): T {
  if (!result.ok) {
    throw toHttpException(result.error);
  }
  return result.value;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

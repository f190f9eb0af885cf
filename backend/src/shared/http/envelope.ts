/**
 * backend/src/shared/http/envelope.ts
 *
 * Uniform JSON envelope for every module response.
 * Errors are shaped by error-handler.ts, never by controllers.
 */

import type { AppErrorCode } from './errors';

export type SuccessEnvelope<T> = {
  status: 'success';
  data: T;
};

export type ErrorEnvelope = {
  status: 'error';
  error: string;
  code: AppErrorCode;
};

export type Envelope<T> = SuccessEnvelope<T> | ErrorEnvelope;

export function ok<T>(data: T): SuccessEnvelope<T> {
  return { status: 'success', data };
}

export function fail(code: AppErrorCode, message: string): ErrorEnvelope {
  return { status: 'error', error: message, code };
}

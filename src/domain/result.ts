/**
 * Result values.
 *
 * Operations that can fail for reasons outside the program (missing
 * credentials, provider outages, unwritable paths) return one of these
 * instead of throwing.
 */

import { TypedError } from './errors';

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  error: TypedError;
}

export type Result<T> = Success<T> | Failure;

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function failure(error: TypedError): Failure {
  return { ok: false, error };
}

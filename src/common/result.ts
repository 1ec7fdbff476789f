import { DomainError } from '../types/errors';

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  error: DomainError;
}

/**
 * Outcome of a service operation. Expected failures travel as values.
 */
export type Result<T = void> = Success<T> | Failure;

export const ok = <T>(value: T): Success<T> => ({ ok: true, value });

export const done = (): Success<void> => ({ ok: true, value: undefined });

export const fail = (error: DomainError): Failure => ({ ok: false, error });

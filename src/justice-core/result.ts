import type { FieldError } from '@shared/types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FailureKind = 'access_denied' | 'not_found' | 'validation' | 'unexpected';

export interface WorkflowSuccess<T> {
  ok: true;
  data: T;
  message: string;
  redirectTo: string;
}

export interface WorkflowFailure {
  ok: false;
  kind: FailureKind;
  error: string;
  fieldErrors?: FieldError[];
  redirectTo?: string;
}

export type WorkflowResult<T> = WorkflowSuccess<T> | WorkflowFailure;

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function succeed<T>(data: T, message: string, redirectTo: string): WorkflowSuccess<T> {
  return { ok: true, data, message, redirectTo };
}

export function accessDenied(error: string, redirectTo: string): WorkflowFailure {
  return { ok: false, kind: 'access_denied', error, redirectTo };
}

export function notFound(entity: string): WorkflowFailure {
  return { ok: false, kind: 'not_found', error: `${entity} not found` };
}

export function invalid(error: string, fieldErrors?: FieldError[]): WorkflowFailure {
  return fieldErrors
    ? { ok: false, kind: 'validation', error, fieldErrors }
    : { ok: false, kind: 'validation', error };
}

export function unexpected(error: string): WorkflowFailure {
  return { ok: false, kind: 'unexpected', error };
}

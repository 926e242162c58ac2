/**
 * Convention errors and validation results
 */

import type { ConventionErrorCode } from '@waypost/core';

export type ConventionRule =
  | 'structure'
  | 'initials'
  | 'ticket'
  | 'description'
  | 'description-words'
  | 'single-line'
  | 'type'
  | 'scope'
  | 'subject'
  | 'trailing-period'
  | 'length'
  | 'body-separator'
  | 'summary';

export class ConventionError extends Error {
  constructor(
    public code: ConventionErrorCode,
    public rule: ConventionRule,
    message: string,
    public input: string
  ) {
    super(message);
    this.name = 'ConventionError';
  }
}

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ConventionError };

export function valid<T>(value: T): ValidationResult<T> {
  return { ok: true, value };
}

export function invalidFormat<T>(
  rule: ConventionRule,
  message: string,
  input: string
): ValidationResult<T> {
  return { ok: false, error: new ConventionError('InvalidFormat', rule, message, input) };
}

export function lineTooLong<T>(
  rule: ConventionRule,
  message: string,
  input: string
): ValidationResult<T> {
  return { ok: false, error: new ConventionError('LineTooLong', rule, message, input) };
}

/**
 * LineTooLong is a specialization of InvalidFormat
 */
export function isInvalidFormat(error: ConventionError): boolean {
  return error.code === 'InvalidFormat' || error.code === 'LineTooLong';
}

/**
 * Return the validated value or throw the convention error
 */
export function unwrap<T>(result: ValidationResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

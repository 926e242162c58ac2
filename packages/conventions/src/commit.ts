/**
 * Commit subjects: <type>(<scope>)?!?: <subject>
 */

import {
  COMMIT_TYPES,
  CONVENTION_LIMITS,
  type CommitMessage,
  type CommitSubject,
} from '@waypost/core';
import { invalidFormat, lineTooLong, valid, type ValidationResult } from './errors.js';
import { extractTicketReferences, type TicketExtractionOptions } from './ticket.js';

const SUBJECT_LINE = /^([^\s():!]+)(?:\(([^()]*)\))?(!)?: (.*)$/;
const SCOPE = /^[\w./-]+$/;

export function validateCommitSubject(raw: string): ValidationResult<CommitSubject> {
  const value = raw.trim();

  if (value.includes('\n')) {
    return invalidFormat('single-line', 'Commit subject must be a single line', value);
  }

  const match = SUBJECT_LINE.exec(value);
  if (!match) {
    return invalidFormat(
      'structure',
      `Commit subject must match <type>(<scope>): <subject>: "${value}"`,
      value
    );
  }

  const [, rawType, scope, bang, subject] = match;

  const type = COMMIT_TYPES.find((candidate) => candidate === rawType);
  if (!type) {
    return invalidFormat(
      'type',
      `Unknown commit type "${rawType}", expected one of ${COMMIT_TYPES.join(', ')}`,
      value
    );
  }

  if (scope !== undefined && !SCOPE.test(scope)) {
    return invalidFormat('scope', `Invalid commit scope: "(${scope})"`, value);
  }

  if (subject.trim() === '' || subject !== subject.trimStart()) {
    return invalidFormat('subject', 'Commit subject text must follow ": " directly', value);
  }

  if (subject.endsWith('.')) {
    return invalidFormat('trailing-period', 'Commit subject must not end with "."', value);
  }

  const length = [...value].length;
  if (length > CONVENTION_LIMITS.maxSubjectLength) {
    return lineTooLong(
      'length',
      `Commit subject is ${length} characters, limit is ${CONVENTION_LIMITS.maxSubjectLength}`,
      value
    );
  }

  return valid(
    Object.freeze({
      kind: 'commit' as const,
      value,
      type,
      scope: scope ?? null,
      breaking: bang === '!',
      subject,
    })
  );
}

/**
 * Validate a full commit message: subject line, blank line, optional body
 */
export function validateCommitMessage(
  raw: string,
  options: TicketExtractionOptions = {}
): ValidationResult<CommitMessage> {
  const value = raw.replace(/\r\n/g, '\n').trim();
  const [firstLine = '', separator, ...bodyLines] = value.split('\n');

  const subject = validateCommitSubject(firstLine);
  if (!subject.ok) {
    return subject;
  }

  if (separator !== undefined && separator.trim() !== '') {
    return invalidFormat(
      'body-separator',
      'Commit body must be separated from the subject by a blank line',
      value
    );
  }

  const body = bodyLines.join('\n').trim();

  return valid(
    Object.freeze({
      subject: subject.value,
      body: body === '' ? null : body,
      tickets: Object.freeze(extractTicketReferences(value, options)),
    })
  );
}

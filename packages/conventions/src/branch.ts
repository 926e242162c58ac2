/**
 * Branch names: <initials>/<TICKET>-<kebab-description>
 */

import { CONVENTION_LIMITS, type BranchName, type TicketRef } from '@waypost/core';
import { invalidFormat, valid, type ValidationResult } from './errors.js';
import { parseTicket } from './ticket.js';

const INITIALS = new RegExp(`^[a-z]{1,${CONVENTION_LIMITS.maxInitialsLength}}$`);
const TICKET_AND_DESCRIPTION = /^([A-Za-z]+-\d+)(?:-(.*))?$/;
const KEBAB_CASE = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export function validateBranchName(raw: string): ValidationResult<BranchName> {
  const value = raw.trim();
  const slash = value.indexOf('/');

  if (slash === -1 || slash !== value.lastIndexOf('/')) {
    return invalidFormat(
      'structure',
      `Branch name must have the form <initials>/<TICKET>-<description>: "${value}"`,
      value
    );
  }

  const initials = value.slice(0, slash);
  const rest = value.slice(slash + 1);

  if (!INITIALS.test(initials)) {
    return invalidFormat(
      'initials',
      `Initials must be 1-${CONVENTION_LIMITS.maxInitialsLength} lowercase letters: "${initials}"`,
      value
    );
  }

  const match = TICKET_AND_DESCRIPTION.exec(rest);
  const ticket = match ? parseTicket(match[1]) : null;
  if (!match || !ticket) {
    return invalidFormat(
      'ticket',
      `Branch name must start with a ticket key after the initials: "${rest}"`,
      value
    );
  }

  const description = match[2] ?? '';
  if (description === '') {
    return invalidFormat('description', 'Branch name is missing a description', value);
  }

  if (!KEBAB_CASE.test(description)) {
    return invalidFormat(
      'description',
      `Description must be lowercase kebab-case: "${description}"`,
      value
    );
  }

  const words = description.split('-');
  const { minDescriptionWords, maxDescriptionWords } = CONVENTION_LIMITS;
  if (words.length < minDescriptionWords || words.length > maxDescriptionWords) {
    return invalidFormat(
      'description-words',
      `Description must have ${minDescriptionWords}-${maxDescriptionWords} words, got ${words.length}`,
      value
    );
  }

  return valid(
    Object.freeze({
      kind: 'branch' as const,
      value,
      initials,
      ticket: Object.freeze(ticket),
      description,
      words: Object.freeze(words),
    })
  );
}

/**
 * Turn free text into kebab-case words suitable for a branch description
 */
export function slugify(input: string, maxWords: number = CONVENTION_LIMITS.maxDescriptionWords): string {
  return input
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .split('-')
    .filter((word) => word.length > 0)
    .slice(0, maxWords)
    .join('-');
}

export interface BranchNameParts {
  initials: string;
  ticket: string | TicketRef;
  summary: string;
}

/**
 * Build a branch name from its parts. Initials are not coerced; the summary is
 * slugified and cut to the maximum word count. The result is validated.
 */
export function buildBranchName(parts: BranchNameParts): ValidationResult<BranchName> {
  const rawKey = typeof parts.ticket === 'string' ? parts.ticket : parts.ticket.key;
  const ticket = parseTicket(rawKey);
  if (!ticket) {
    return invalidFormat('ticket', `Not a ticket key: "${rawKey}"`, rawKey);
  }

  return validateBranchName(
    `${parts.initials.trim()}/${ticket.key.toLowerCase()}-${slugify(parts.summary)}`
  );
}

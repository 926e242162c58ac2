/**
 * PR titles: "<TICKET>: <summary>"
 */

import { CONVENTION_LIMITS, type PRTitle, type TicketRef } from '@waypost/core';
import { invalidFormat, valid, type ValidationResult } from './errors.js';
import { parseTicket } from './ticket.js';

export function buildPRTitle(ticket: string | TicketRef, summary: string): ValidationResult<PRTitle> {
  // A TicketRef from the caller is re-parsed so its key is held to the same pattern
  const rawKey = typeof ticket === 'string' ? ticket : ticket.key;
  const ticketRef = parseTicket(rawKey);
  const trimmedSummary = summary.trim();
  const input = `${rawKey.trim()}: ${trimmedSummary}`;

  if (!ticketRef) {
    return invalidFormat('ticket', `Not a ticket key: "${rawKey}"`, input);
  }

  if (trimmedSummary === '') {
    return invalidFormat('summary', 'PR title summary must not be empty', input);
  }

  const value = `${ticketRef.key}: ${trimmedSummary}`;
  const length = [...value].length;
  if (length > CONVENTION_LIMITS.maxTitleLength) {
    return invalidFormat(
      'length',
      `PR title is ${length} characters, limit is ${CONVENTION_LIMITS.maxTitleLength}`,
      value
    );
  }

  return valid(
    Object.freeze({
      kind: 'pr-title' as const,
      value,
      ticket: Object.freeze(ticketRef),
      summary: trimmedSummary,
    })
  );
}

/**
 * Parse an existing "<TICKET>: <summary>" title
 */
export function validatePRTitle(raw: string): ValidationResult<PRTitle> {
  const value = raw.trim();
  const separator = value.indexOf(': ');

  if (separator === -1) {
    return invalidFormat('structure', `PR title must have the form <TICKET>: <summary>: "${value}"`, value);
  }

  return buildPRTitle(value.slice(0, separator), value.slice(separator + 2));
}

/**
 * Ticket reference detection
 *
 * Tickets are issue-tracker keys of the form PROJECT-NUMBER. Detection is
 * case-insensitive; every ticket leaves this module uppercase.
 */

import { TICKET_PATTERN_SOURCE, type TicketRef } from '@waypost/core';

export interface TicketExtractionOptions {
  /** Only accept tickets from these projects (case-insensitive) */
  projectKeys?: readonly string[];
}

const EXACT_TICKET = new RegExp(`^${TICKET_PATTERN_SOURCE}$`);

function toTicketRef(project: string, digits: string): TicketRef {
  const normalizedProject = project.toUpperCase();
  return {
    key: `${normalizedProject}-${digits}`,
    project: normalizedProject,
    number: Number.parseInt(digits, 10),
  };
}

function allowedProjects(options: TicketExtractionOptions): Set<string> | null {
  if (!options.projectKeys || options.projectKeys.length === 0) return null;
  return new Set(options.projectKeys.map((key) => key.toUpperCase()));
}

/**
 * Parse a string that is exactly one ticket key, e.g. "titan-149"
 */
export function parseTicket(raw: string): TicketRef | null {
  const match = EXACT_TICKET.exec(raw.trim());
  if (!match) return null;
  return toTicketRef(match[1], match[2]);
}

/**
 * All distinct ticket references in order of first appearance
 */
export function extractTicketReferences(
  text: string,
  options: TicketExtractionOptions = {}
): TicketRef[] {
  const allowed = allowedProjects(options);
  const seen = new Set<string>();
  const tickets: TicketRef[] = [];

  for (const match of text.matchAll(new RegExp(`\\b${TICKET_PATTERN_SOURCE}\\b`, 'g'))) {
    const ticket = toTicketRef(match[1], match[2]);
    if (allowed && !allowed.has(ticket.project)) continue;
    if (seen.has(ticket.key)) continue;
    seen.add(ticket.key);
    tickets.push(ticket);
  }

  return tickets;
}

/**
 * First ticket reference in the text, or null when there is none
 */
export function extractTicketReference(
  text: string,
  options: TicketExtractionOptions = {}
): TicketRef | null {
  return extractTicketReferences(text, options)[0] ?? null;
}

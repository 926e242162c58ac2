/**
 * Ticket Command
 *
 * Prints the ticket reference(s) found in text, one per line.
 */

import { extractTicketReference, extractTicketReferences } from '@waypost/conventions';
import type { WaypostConfig } from '@waypost/core';
import { printError } from '../output.js';

export interface TicketOptions {
  all?: boolean;
}

export function ticketCommand(text: string[], options: TicketOptions, config: WaypostConfig): number {
  const input = text.join(' ');
  const extraction = { projectKeys: config.conventions.projectKeys };

  const tickets = options.all
    ? extractTicketReferences(input, extraction)
    : [extractTicketReference(input, extraction)].filter((ticket) => ticket !== null);

  if (tickets.length === 0) {
    printError('No ticket reference found');
    return 1;
  }

  for (const ticket of tickets) {
    console.log(ticket.key);
  }
  return 0;
}

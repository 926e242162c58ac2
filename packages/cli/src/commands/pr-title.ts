/**
 * PR Title Command
 */

import { buildPRTitle } from '@waypost/conventions';
import { printConventionError } from '../output.js';

export function prTitleCommand(ticket: string, summary: string[]): number {
  const result = buildPRTitle(ticket, summary.join(' '));
  if (!result.ok) {
    printConventionError(result.error);
    return 1;
  }

  console.log(result.value.value);
  return 0;
}

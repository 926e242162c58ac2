/**
 * Branch Commands
 *
 * Validates branch names and builds new ones from a ticket and a summary.
 */

import { buildBranchName, validateBranchName } from '@waypost/conventions';
import type { WaypostConfig } from '@waypost/core';
import { printConventionError, printDetail, printError, printValid } from '../output.js';

export function branchValidateCommand(name: string): number {
  const result = validateBranchName(name);
  if (!result.ok) {
    printConventionError(result.error);
    return 1;
  }

  const branch = result.value;
  printValid(branch.value);
  printDetail('initials', branch.initials);
  printDetail('ticket', branch.ticket.key);
  printDetail('description', branch.words.join(' '));
  return 0;
}

export interface BranchCreateOptions {
  ticket: string;
  initials?: string;
}

/**
 * Prints only the branch name so it can be used in `git switch -c $(...)`
 */
export function branchCreateCommand(
  summary: string[],
  options: BranchCreateOptions,
  config: WaypostConfig
): number {
  const initials = options.initials ?? config.conventions.initials;
  if (!initials) {
    printError('No initials given: pass --initials or set conventions.initials in .waypost.yml');
    return 1;
  }

  const result = buildBranchName({ initials, ticket: options.ticket, summary: summary.join(' ') });
  if (!result.ok) {
    printConventionError(result.error);
    return 1;
  }

  console.log(result.value.value);
  return 0;
}

/**
 * Commit Commands
 *
 * `commit check` validates a subject line; `commit message` validates a whole
 * message and works as a commit-msg hook through --file.
 */

import { readFile } from 'fs/promises';
import { validateCommitMessage, validateCommitSubject } from '@waypost/conventions';
import type { WaypostConfig } from '@waypost/core';
import { printConventionError, printDetail, printError, printValid } from '../output.js';

export function commitCheckCommand(subject: string): number {
  const result = validateCommitSubject(subject);
  if (!result.ok) {
    printConventionError(result.error);
    return 1;
  }

  const commit = result.value;
  printValid(commit.value);
  printDetail('type', commit.breaking ? `${commit.type} (breaking)` : commit.type);
  if (commit.scope !== null) {
    printDetail('scope', commit.scope);
  }
  return 0;
}

export interface CommitMessageOptions {
  file?: string;
}

// Git leaves comment lines in the message file it hands to hooks
function stripComments(message: string): string {
  return message
    .split(/\r?\n/)
    .filter((line) => !line.startsWith('#'))
    .join('\n');
}

export async function commitMessageCommand(
  message: string | undefined,
  options: CommitMessageOptions,
  config: WaypostConfig
): Promise<number> {
  let raw: string;
  if (options.file) {
    raw = stripComments(await readFile(options.file, 'utf-8'));
  } else if (message !== undefined) {
    raw = message;
  } else {
    printError('Pass a commit message or --file <path>');
    return 1;
  }

  const result = validateCommitMessage(raw, { projectKeys: config.conventions.projectKeys });
  if (!result.ok) {
    printConventionError(result.error);
    return 1;
  }

  printValid(result.value.subject.value);
  if (result.value.tickets.length > 0) {
    printDetail('tickets', result.value.tickets.map((ticket) => ticket.key).join(', '));
  }
  return 0;
}

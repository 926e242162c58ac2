#!/usr/bin/env node
/**
 * Waypost CLI
 *
 * Checks branch, commit and PR title conventions and fetches pull request
 * data through the query orchestrator.
 */

import './env.js';
import { Command } from 'commander';
import { branchCreateCommand, branchValidateCommand } from './commands/branch.js';
import { commitCheckCommand, commitMessageCommand } from './commands/commit.js';
import { fetchCommand } from './commands/fetch.js';
import { prTitleCommand } from './commands/pr-title.js';
import { ticketCommand } from './commands/ticket.js';
import { loadCliConfig } from './context.js';

const program = new Command();

program
  .name('waypost')
  .description('Naming conventions and cost-ranked retrieval for GitHub pull requests')
  .version('0.1.0');

const branch = program.command('branch').description('Branch name conventions');

branch
  .command('validate')
  .description('Validate a branch name (<initials>/<TICKET>-<description>)')
  .argument('<name>', 'Branch name')
  .action((name: string) => {
    process.exitCode = branchValidateCommand(name);
  });

branch
  .command('create')
  .description('Build a branch name from a ticket and a summary')
  .argument('<summary...>', 'Short summary of the change')
  .requiredOption('-t, --ticket <ticket>', 'Ticket key, e.g. TITAN-149')
  .option('-i, --initials <initials>', 'Author initials (defaults to conventions.initials)')
  .action(async (summary: string[], options: { ticket: string; initials?: string }) => {
    const config = await loadCliConfig();
    process.exitCode = config ? branchCreateCommand(summary, options, config) : 1;
  });

const commit = program.command('commit').description('Commit message conventions');

commit
  .command('check')
  .description('Validate a commit subject line')
  .argument('<subject>', 'Commit subject')
  .action((subject: string) => {
    process.exitCode = commitCheckCommand(subject);
  });

commit
  .command('message')
  .description('Validate a full commit message')
  .argument('[message]', 'Commit message')
  .option('-F, --file <path>', 'Read the message from a file (commit-msg hook)')
  .action(async (message: string | undefined, options: { file?: string }) => {
    const config = await loadCliConfig();
    process.exitCode = config ? await commitMessageCommand(message, options, config) : 1;
  });

program
  .command('ticket')
  .description('Extract ticket references from text')
  .argument('<text...>', 'Text to search')
  .option('-a, --all', 'Print every distinct ticket instead of the first')
  .action(async (text: string[], options: { all?: boolean }) => {
    const config = await loadCliConfig();
    process.exitCode = config ? ticketCommand(text, options, config) : 1;
  });

program
  .command('pr-title')
  .description('Build a PR title (<TICKET>: <summary>)')
  .argument('<ticket>', 'Ticket key')
  .argument('<summary...>', 'Summary')
  .action((ticket: string, summary: string[]) => {
    process.exitCode = prTitleCommand(ticket, summary);
  });

program
  .command('fetch')
  .description('Fetch a pull request resource, falling back across retrieval strategies')
  .argument('<resource>', 'pr-metadata, pr-files, pr-diff, commit-history, issue, ticket-search or change-analysis')
  .argument('<key>', 'owner/repo#42, owner/repo, owner/repo@ref or owner/repo#TICKET-1')
  .option('-s, --size-hint <tokens>', 'Expected response size in tokens')
  .option('--timeout <ms>', 'Per-strategy timeout in milliseconds')
  .option('--strategies <list>', 'Comma-separated strategies to allow')
  .option('--json', 'Print the full fetch report as JSON')
  .action(
    async (
      resource: string,
      key: string,
      options: { sizeHint?: string; timeout?: string; strategies?: string; json?: boolean }
    ) => {
      const config = await loadCliConfig();
      if (!config) {
        process.exitCode = 1;
        return;
      }

      const controller = new AbortController();
      const interrupt = () => controller.abort(new Error('Interrupted'));
      process.once('SIGINT', interrupt);
      try {
        process.exitCode = await fetchCommand(resource, key, options, config, {
          signal: controller.signal,
        });
      } finally {
        process.off('SIGINT', interrupt);
      }
    }
  );

await program.parseAsync();

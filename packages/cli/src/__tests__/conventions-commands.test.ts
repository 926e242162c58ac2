import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import chalk from 'chalk';
import { defaultConfig, parseConfig } from '@waypost/core';
import { branchCreateCommand, branchValidateCommand } from '../commands/branch.js';
import { commitCheckCommand, commitMessageCommand } from '../commands/commit.js';
import { prTitleCommand } from '../commands/pr-title.js';
import { ticketCommand } from '../commands/ticket.js';

function captureOutput() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => undefined),
    error: vi.spyOn(console, 'error').mockImplementation(() => undefined),
  };
}

describe('convention commands', () => {
  let output: ReturnType<typeof captureOutput>;

  beforeEach(() => {
    chalk.level = 0;
    output = captureOutput();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('branch validate', () => {
    it('prints the parts of a valid branch name', () => {
      expect(branchValidateCommand('sp/TITAN-149-pii-service')).toBe(0);
      expect(output.log.mock.calls.map((call) => call[0])).toEqual([
        '✔ sp/TITAN-149-pii-service',
        '  initials: sp',
        '  ticket: TITAN-149',
        '  description: pii service',
      ]);
    });

    it('reports the first violated rule', () => {
      expect(branchValidateCommand('SP/titan-149-pii-service')).toBe(1);
      expect(output.error).toHaveBeenCalledTimes(1);
      expect(String(output.error.mock.calls[0][0])).toMatch(/^✖ InvalidFormat \[initials\] /);
    });
  });

  describe('branch create', () => {
    it('prints only the branch name', () => {
      const code = branchCreateCommand(
        ['PII', 'service', 'for', 'exports'],
        { ticket: 'TITAN-149', initials: 'sp' },
        defaultConfig()
      );

      expect(code).toBe(0);
      expect(output.log).toHaveBeenCalledWith('sp/titan-149-pii-service-for-exports');
    });

    it('falls back to configured initials', () => {
      const config = parseConfig('version: "1.0"\nconventions:\n  initials: ab\n');

      expect(branchCreateCommand(['add', 'retries'], { ticket: 'core-7' }, config)).toBe(0);
      expect(output.log).toHaveBeenCalledWith('ab/core-7-add-retries');
    });

    it('fails without initials', () => {
      expect(branchCreateCommand(['add', 'retries'], { ticket: 'CORE-7' }, defaultConfig())).toBe(1);
      expect(output.error).toHaveBeenCalledWith(
        'Error: No initials given: pass --initials or set conventions.initials in .waypost.yml'
      );
    });
  });

  describe('commit check', () => {
    it('accepts a conventional subject', () => {
      expect(commitCheckCommand('feat(api): add PII redaction')).toBe(0);
      expect(output.log.mock.calls.map((call) => call[0])).toEqual([
        '✔ feat(api): add PII redaction',
        '  type: feat',
        '  scope: api',
      ]);
    });

    it('rejects a trailing period', () => {
      expect(commitCheckCommand('fix: handle null input.')).toBe(1);
      expect(String(output.error.mock.calls[0][0])).toMatch(/^✖ InvalidFormat \[trailing-period\] /);
    });

    it('rejects an overlong subject', () => {
      expect(commitCheckCommand(`feat: ${'a'.repeat(74)}`)).toBe(1);
      expect(String(output.error.mock.calls[0][0])).toMatch(/^✖ LineTooLong \[length\] /);
    });
  });

  describe('commit message', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'waypost-cli-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('lists the tickets a message references', async () => {
      const code = await commitMessageCommand(
        'fix: retry on 502\n\nRefs TITAN-149 and core-7',
        {},
        defaultConfig()
      );

      expect(code).toBe(0);
      expect(output.log.mock.calls.map((call) => call[0])).toEqual([
        '✔ fix: retry on 502',
        '  tickets: TITAN-149, CORE-7',
      ]);
    });

    it('reads a hook message file and ignores comment lines', async () => {
      const file = join(dir, 'COMMIT_EDITMSG');
      await writeFile(file, 'docs: explain retrieval ceilings\n# Please enter the commit message\n');

      expect(await commitMessageCommand(undefined, { file }, defaultConfig())).toBe(0);
      expect(output.log).toHaveBeenCalledWith('✔ docs: explain retrieval ceilings');
    });

    it('requires a blank line before the body', async () => {
      expect(await commitMessageCommand('fix: retry\nbody text', {}, defaultConfig())).toBe(1);
      expect(String(output.error.mock.calls[0][0])).toMatch(/^✖ InvalidFormat \[body-separator\] /);
    });

    it('needs a message or a file', async () => {
      expect(await commitMessageCommand(undefined, {}, defaultConfig())).toBe(1);
      expect(output.error).toHaveBeenCalledWith('Error: Pass a commit message or --file <path>');
    });
  });

  describe('ticket', () => {
    it('prints the first ticket', () => {
      expect(ticketCommand(['see', 'titan-149', 'and', 'CORE-7'], {}, defaultConfig())).toBe(0);
      expect(output.log.mock.calls).toEqual([['TITAN-149']]);
    });

    it('prints every ticket with --all', () => {
      expect(ticketCommand(['titan-149', 'CORE-7', 'TITAN-149'], { all: true }, defaultConfig())).toBe(0);
      expect(output.log.mock.calls).toEqual([['TITAN-149'], ['CORE-7']]);
    });

    it('honours the configured project keys', () => {
      const config = parseConfig('version: "1.0"\nconventions:\n  projectKeys: [core]\n');

      expect(ticketCommand(['titan-149', 'CORE-7'], {}, config)).toBe(0);
      expect(output.log.mock.calls).toEqual([['CORE-7']]);
    });

    it('fails when nothing matches', () => {
      expect(ticketCommand(['no', 'tickets', 'here'], {}, defaultConfig())).toBe(1);
      expect(output.error).toHaveBeenCalledWith('Error: No ticket reference found');
    });
  });

  describe('pr-title', () => {
    it('prints the title', () => {
      expect(prTitleCommand('titan-149', ['Add', 'PII', 'service'])).toBe(0);
      expect(output.log).toHaveBeenCalledWith('TITAN-149: Add PII service');
    });

    it('rejects an invalid ticket', () => {
      expect(prTitleCommand('TITAN', ['Add', 'PII', 'service'])).toBe(1);
      expect(String(output.error.mock.calls[0][0])).toMatch(/^✖ InvalidFormat \[ticket\] /);
    });
  });
});

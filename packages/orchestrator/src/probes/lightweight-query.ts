/**
 * Lightweight Query Probe
 *
 * Retrieves data through the GitHub CLI (`gh`). Handles larger responses than
 * the REST client; output past the ceiling is cut off and reported as
 * size_exceeded.
 */

import {
  createLogger,
  DEFAULT_CAPACITY_CEILINGS,
  GH_CLI_SETTINGS,
  GITHUB_LISTING_LIMITS,
  SIZE_ESTIMATION,
  estimateTokens,
  type RetrievalOutcome,
  type RetrievalRequest,
} from '@waypost/core';
import { runCommand, type CommandResult, type CommandRunner } from '@waypost/agents';
import {
  errorMessage,
  oversizeEstimate,
  payloadOutcome,
  permissionDenied,
  sizeExceeded,
  transientFailure,
} from './outcome.js';
import type { CapabilityProbe, ProbeContext } from './types.js';

const logger = createLogger('probe:lightweight-query');

const PR_FIELDS = [
  'number',
  'title',
  'state',
  'isDraft',
  'author',
  'baseRefName',
  'headRefName',
  'body',
  'changedFiles',
  'additions',
  'deletions',
  'url',
].join(',');

const ISSUE_FIELDS = ['number', 'title', 'state', 'body', 'author', 'labels', 'url'].join(',');

const SEARCH_FIELDS = ['number', 'title', 'state', 'url', 'isPullRequest'].join(',');

const RATE_LIMITED = /rate limit/i;
const UNAUTHORIZED = /HTTP 401|HTTP 403|gh auth login|authentication|not authorized|Resource not accessible/i;
const NOT_FOUND = /HTTP 404|Could not resolve to a|not found/i;
const TOO_LARGE = /HTTP 406|too large|exceeded the maximum/i;

export interface LightweightQueryProbeOptions {
  binary?: string;
  capacityCeiling?: number;
  timeout?: number;
  runner?: CommandRunner;
}

interface GhCommand {
  args: string[];
  format: 'json' | 'text';
  /** `gh api --paginate --slurp` output: one array per page */
  paged?: boolean;
  /** GitHub lists no more than this many entries */
  listingLimit?: number;
}

function apiListing(path: string, listingLimit?: number): GhCommand {
  return { args: ['api', '--paginate', '--slurp', path], format: 'json', paged: true, listingLimit };
}

function flattenPages(data: unknown): unknown[] | null {
  if (!Array.isArray(data)) return null;
  const entries: unknown[] = [];
  for (const page of data) {
    if (!Array.isArray(page)) return null;
    entries.push(...page);
  }
  return entries;
}

export class LightweightQueryProbe implements CapabilityProbe {
  readonly strategy = 'lightweight_query' as const;
  readonly capacityCeiling: number;
  private binary: string;
  private timeout: number;
  private runner: CommandRunner;

  constructor(options: LightweightQueryProbeOptions = {}) {
    this.binary = options.binary ?? GH_CLI_SETTINGS.binary;
    this.capacityCeiling = options.capacityCeiling ?? DEFAULT_CAPACITY_CEILINGS.lightweight_query;
    this.timeout = options.timeout ?? GH_CLI_SETTINGS.defaultTimeout;
    this.runner = options.runner ?? runCommand;
  }

  supports(request: RetrievalRequest): boolean {
    return request.resource !== 'change-analysis';
  }

  /**
   * The gh invocation for a request
   */
  buildCommand(request: RetrievalRequest): GhCommand {
    const { key } = request;
    const repo = `${key.owner}/${key.repo}`;

    if (key.kind === 'ticket') {
      return {
        args: ['search', 'issues', key.ticket, '--repo', repo, '--include-prs', '--json', SEARCH_FIELDS],
        format: 'json',
      };
    }

    if (key.kind === 'repository') {
      const query = key.ref ? `?per_page=100&sha=${encodeURIComponent(key.ref)}` : '?per_page=100';
      return apiListing(`repos/${repo}/commits${query}`);
    }

    const number = String(key.number);
    switch (request.resource) {
      case 'pr-metadata':
        return { args: ['pr', 'view', number, '--repo', repo, '--json', PR_FIELDS], format: 'json' };
      case 'pr-files':
        return apiListing(
          `repos/${repo}/pulls/${number}/files?per_page=100`,
          GITHUB_LISTING_LIMITS.pullFiles
        );
      case 'pr-diff':
        return { args: ['pr', 'diff', number, '--repo', repo], format: 'text' };
      case 'commit-history':
        return apiListing(
          `repos/${repo}/pulls/${number}/commits?per_page=100`,
          GITHUB_LISTING_LIMITS.pullCommits
        );
      case 'issue':
        return { args: ['issue', 'view', number, '--repo', repo, '--json', ISSUE_FIELDS], format: 'json' };
      case 'ticket-search':
      case 'change-analysis':
        throw new Error(`${request.resource} is not available through gh`);
    }
  }

  async invoke(request: RetrievalRequest, context: ProbeContext): Promise<RetrievalOutcome> {
    const command = this.buildCommand(request);
    const maxOutputChars = Number.isFinite(this.capacityCeiling)
      ? this.capacityCeiling * SIZE_ESTIMATION.charsPerToken
      : undefined;

    let result: CommandResult;
    try {
      result = await this.runner(this.binary, command.args, {
        timeout: this.timeout,
        signal: context.signal,
        maxOutputChars,
      });
    } catch (err) {
      if (context.signal.aborted) throw err;
      return transientFailure(errorMessage(err));
    }

    if (result.truncated) {
      return sizeExceeded(
        Math.max(estimateTokens(result.stdout), oversizeEstimate(this.capacityCeiling, request))
      );
    }

    if (result.timedOut) {
      return transientFailure(`${this.binary} timed out after ${this.timeout}ms`);
    }

    if (result.exitCode !== 0) {
      return this.classifyFailure(result.stderr, request);
    }

    if (command.format === 'text') {
      return payloadOutcome(this.strategy, request, 'text', result.stdout, this.capacityCeiling);
    }

    let data: unknown;
    try {
      data = JSON.parse(result.stdout);
    } catch {
      return transientFailure(`Unparseable ${this.binary} output`);
    }

    if (command.paged) {
      const entries = flattenPages(data);
      if (!entries) {
        return transientFailure(`Unexpected ${this.binary} output: expected pages of entries`);
      }
      // A listing that reached GitHub's cap may be missing entries
      if (command.listingLimit !== undefined && entries.length >= command.listingLimit) {
        logger.info({ entries: entries.length }, 'gh listing reached the GitHub limit');
        return sizeExceeded(
          Math.max(estimateTokens(result.stdout), oversizeEstimate(this.capacityCeiling, request))
        );
      }
      data = entries;
    }

    return payloadOutcome(this.strategy, request, 'json', data, this.capacityCeiling);
  }

  private classifyFailure(stderr: string, request: RetrievalRequest): RetrievalOutcome {
    const firstLine = stderr.trim().split('\n')[0] ?? '';
    logger.debug({ stderr: firstLine }, 'gh command failed');

    if (RATE_LIMITED.test(stderr)) {
      return transientFailure(`rate limited: ${firstLine}`);
    }

    if (UNAUTHORIZED.test(stderr)) {
      return permissionDenied(firstLine || 'unauthorized');
    }

    if (NOT_FOUND.test(stderr)) {
      return permissionDenied('not found or not accessible');
    }

    if (TOO_LARGE.test(stderr)) {
      return sizeExceeded(oversizeEstimate(this.capacityCeiling, request));
    }

    return transientFailure(firstLine || `${this.binary} exited with an error`);
  }
}

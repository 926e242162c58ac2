/**
 * Structured API Probe
 *
 * Retrieves data through the authenticated GitHub REST API. Cheapest path,
 * bounded by a modest capacity ceiling.
 */

import {
  createLogger,
  DEFAULT_CAPACITY_CEILINGS,
  SIZE_ESTIMATION,
  sizeHintFromChangeStats,
  type RetrievalOutcome,
  type RetrievalRequest,
} from '@waypost/core';
import type { GitHubApi, PullSummary } from './github-api.js';
import { classifyHttpError, oversizeEstimate, payloadOutcome, sizeExceeded } from './outcome.js';
import type { CapabilityProbe, ProbeContext } from './types.js';

const logger = createLogger('probe:structured-api');

export class StructuredApiProbe implements CapabilityProbe {
  readonly strategy = 'structured_api' as const;

  constructor(
    private api: GitHubApi,
    readonly capacityCeiling: number = DEFAULT_CAPACITY_CEILINGS.structured_api
  ) {}

  supports(request: RetrievalRequest): boolean {
    return request.resource !== 'change-analysis';
  }

  async invoke(request: RetrievalRequest, context: ProbeContext): Promise<RetrievalOutcome> {
    try {
      return await this.retrieve(request, context.signal);
    } catch (err) {
      if (context.signal.aborted) throw err;

      const outcome = classifyHttpError(err, this.capacityCeiling, request);
      logger.debug({ err, outcome: outcome.kind }, 'GitHub API request failed');
      return outcome;
    }
  }

  private async retrieve(
    request: RetrievalRequest,
    signal: AbortSignal
  ): Promise<RetrievalOutcome> {
    const { key } = request;
    const repo = { owner: key.owner, repo: key.repo };

    if (key.kind === 'ticket') {
      const issues = await this.api.searchIssues(repo, key.ticket, signal);
      return this.wrap(request, 'json', issues);
    }

    if (key.kind === 'repository') {
      // Past this many commits the listing is over the ceiling whatever they hold
      const limit = Number.isFinite(this.capacityCeiling)
        ? Math.floor(this.capacityCeiling / SIZE_ESTIMATION.minTokensPerCommit) + 1
        : undefined;
      const commits = await this.api.listCommits(repo, { ref: key.ref, limit }, signal);
      return this.wrap(request, 'json', commits);
    }

    switch (request.resource) {
      case 'pr-metadata':
        return this.wrap(request, 'json', await this.api.getPull(repo, key.number, signal));

      case 'pr-files': {
        const pull = await this.api.getPull(repo, key.number, signal);
        const oversize = this.checkChangeSize(pull);
        if (oversize) return oversize;

        const files = await this.api.listPullFiles(repo, key.number, signal);
        if (files.length < pull.changedFiles) {
          return this.listingShortfall(request, pull, 'files', files.length, pull.changedFiles);
        }
        return this.wrap(request, 'json', files);
      }

      case 'pr-diff': {
        const oversize = this.checkChangeSize(await this.api.getPull(repo, key.number, signal));
        if (oversize) return oversize;
        return this.wrap(request, 'text', await this.api.getPullDiff(repo, key.number, signal));
      }

      case 'commit-history': {
        const pull = await this.api.getPull(repo, key.number, signal);
        const commits = await this.api.listCommits(repo, { pullNumber: key.number }, signal);
        if (commits.length < pull.commits) {
          return this.listingShortfall(request, pull, 'commits', commits.length, pull.commits);
        }
        return this.wrap(request, 'json', commits);
      }

      case 'issue':
        return this.wrap(request, 'json', await this.api.getIssue(repo, key.number, signal));

      case 'ticket-search':
      case 'change-analysis':
        throw new Error(`${request.resource} is not available through the GitHub API`);
    }
  }

  /**
   * Refuse a change set whose stats already put it past the ceiling
   */
  private checkChangeSize(pull: PullSummary): RetrievalOutcome | null {
    const estimate = sizeHintFromChangeStats(pull);
    if (estimate > this.capacityCeiling) {
      logger.info(
        { changedFiles: pull.changedFiles, estimate, ceiling: this.capacityCeiling },
        'Change set too large for the GitHub API'
      );
      return sizeExceeded(estimate);
    }
    return null;
  }

  /**
   * GitHub listed fewer entries than the pull request has
   */
  private listingShortfall(
    request: RetrievalRequest,
    pull: PullSummary,
    entries: 'files' | 'commits',
    listed: number,
    expected: number
  ): RetrievalOutcome {
    const estimate = Math.max(
      sizeHintFromChangeStats(pull),
      oversizeEstimate(this.capacityCeiling, request)
    );
    logger.info({ entries, listed, expected, estimate }, 'GitHub API listing cut short');
    return sizeExceeded(estimate);
  }

  private wrap(request: RetrievalRequest, format: 'json' | 'text', data: unknown): RetrievalOutcome {
    return payloadOutcome(this.strategy, request, format, data, this.capacityCeiling);
  }
}

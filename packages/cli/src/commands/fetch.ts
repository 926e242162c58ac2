/**
 * Fetch Command
 *
 * Retrieves a pull request, issue or ticket resource through the query
 * orchestrator and prints the payload.
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  formatDuration,
  type FetchReport,
  type RetrievalOutcome,
  type RetrievalRequest,
  type RetrievalStrategy,
  type WaypostConfig,
} from '@waypost/core';
import {
  createGitHubClient,
  createOctokitApi,
  createOrchestrator,
  FetchCancelledError,
  InvalidRetrievalRequestError,
  MissingCredentialsError,
  NoSuitableStrategyError,
  QueryOrchestrator,
  RETRIEVAL_RESOURCES,
  isRetrievalResource,
  parseRetrievalKey,
  resolveCredentials,
  type GitHubApi,
} from '@waypost/orchestrator';
import { printError } from '../output.js';

export interface FetchCommandOptions {
  sizeHint?: string;
  timeout?: string;
  strategies?: string;
  json?: boolean;
}

export interface FetchCommandDeps {
  /** Replaces the orchestrator built from config and environment */
  orchestrator?: QueryOrchestrator;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

const STRATEGY_NAMES: RetrievalStrategy[] = [
  'structured_api',
  'lightweight_query',
  'delegated_analysis',
];

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseCount(value: string | undefined, flag: string, minimum: number): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) < minimum) {
    throw new UsageError(`${flag} must be an integer of at least ${minimum}, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

function parseStrategies(value: string): RetrievalStrategy[] {
  return value.split(',').map((name) => {
    const strategy = STRATEGY_NAMES.find((candidate) => candidate === name.trim());
    if (!strategy) {
      throw new UsageError(`Unknown strategy "${name.trim()}", expected one of ${STRATEGY_NAMES.join(', ')}`);
    }
    return strategy;
  });
}

/**
 * Config with only the listed strategies enabled
 */
export function restrictStrategies(config: WaypostConfig, only: RetrievalStrategy[]): WaypostConfig {
  const { strategies } = config.retrieval;
  return {
    ...config,
    retrieval: {
      ...config.retrieval,
      strategies: {
        structuredApi: {
          ...strategies.structuredApi,
          enabled: strategies.structuredApi.enabled && only.includes('structured_api'),
        },
        lightweightQuery: {
          ...strategies.lightweightQuery,
          enabled: strategies.lightweightQuery.enabled && only.includes('lightweight_query'),
        },
        delegatedAnalysis: {
          ...strategies.delegatedAnalysis,
          enabled: strategies.delegatedAnalysis.enabled && only.includes('delegated_analysis'),
        },
      },
    },
  };
}

function githubApiFromEnv(env: NodeJS.ProcessEnv): GitHubApi | null {
  try {
    return createOctokitApi(createGitHubClient(resolveCredentials(env)));
  } catch (err) {
    if (err instanceof MissingCredentialsError) return null;
    throw err;
  }
}

export function describeOutcome(outcome: RetrievalOutcome): string {
  switch (outcome.kind) {
    case 'success':
      return `Retrieved via ${outcome.payload.strategy} (~${outcome.payload.estimatedSize} tokens)`;
    case 'size_exceeded':
      return `Too large for every strategy (~${outcome.estimatedSize} tokens)`;
    case 'transient_failure':
      return `All strategies failed: ${outcome.cause}`;
    case 'permission_denied':
      return `Permission denied${outcome.reason ? `: ${outcome.reason}` : ''}`;
  }
}

function printReport(report: FetchReport): void {
  for (const attempt of report.attempts) {
    console.error(
      chalk.gray(
        `  #${attempt.attempt} ${attempt.strategy} → ${attempt.outcome} (${formatDuration(attempt.durationMs)})`
      )
    );
  }

  if (report.outcome.kind === 'success') {
    const { data } = report.outcome.payload;
    console.log(typeof data === 'string' ? data : JSON.stringify(data, null, 2));
  }
}

export async function fetchCommand(
  resource: string,
  key: string,
  options: FetchCommandOptions,
  config: WaypostConfig,
  deps: FetchCommandDeps = {}
): Promise<number> {
  let request: RetrievalRequest;
  let probeTimeoutMs: number | undefined;
  let orchestrator: QueryOrchestrator;

  try {
    if (!isRetrievalResource(resource)) {
      throw new UsageError(`Unknown resource "${resource}", expected one of ${RETRIEVAL_RESOURCES.join(', ')}`);
    }

    request = {
      resource,
      key: parseRetrievalKey(key),
      sizeHint: parseCount(options.sizeHint, '--size-hint', 0),
    };
    probeTimeoutMs = parseCount(options.timeout, '--timeout', 1);

    const effective = options.strategies
      ? restrictStrategies(config, parseStrategies(options.strategies))
      : config;
    orchestrator =
      deps.orchestrator ??
      createOrchestrator(effective, { github: githubApiFromEnv(deps.env ?? process.env) });
  } catch (err) {
    if (err instanceof UsageError || err instanceof InvalidRetrievalRequestError) {
      printError(err.message);
      return 1;
    }
    throw err;
  }

  const spinner = ora({
    text: `Fetching ${resource} for ${key}`,
    isSilent: options.json === true,
    stream: process.stderr,
  }).start();

  let report: FetchReport;
  try {
    report = await orchestrator.fetchWithTrace(request, { signal: deps.signal, probeTimeoutMs });
  } catch (err) {
    if (
      err instanceof FetchCancelledError ||
      err instanceof NoSuitableStrategyError ||
      err instanceof InvalidRetrievalRequestError
    ) {
      spinner.fail(err.message);
      if (options.json) printError(err.message);
      return 1;
    }
    spinner.stop();
    throw err;
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else if (report.outcome.kind === 'success') {
    spinner.succeed(describeOutcome(report.outcome));
    printReport(report);
  } else {
    spinner.fail(describeOutcome(report.outcome));
    printReport(report);
  }

  return report.outcome.kind === 'success' ? 0 : 1;
}

/**
 * Core constants for the Waypost system
 */

import type { CommitType, FetchState, RetrievalStrategy } from '../types/index.js';

// Ticket grammar: PROJECT-NUMBER, matched case-insensitively, emitted uppercase
export const TICKET_PATTERN_SOURCE = '([A-Za-z]+)-(\\d+)';

export const COMMIT_TYPES: readonly CommitType[] = [
  'feat',
  'fix',
  'docs',
  'style',
  'refactor',
  'perf',
  'test',
  'build',
  'ci',
  'chore',
  'revert',
];

export const CONVENTION_LIMITS = {
  maxSubjectLength: 72,
  maxTitleLength: 72,
  maxInitialsLength: 4,
  minDescriptionWords: 2,
  maxDescriptionWords: 6,
} as const;

// Fetch state machine transitions
export const FETCH_STATE_TRANSITIONS: Record<FetchState, FetchState[]> = {
  ranking: ['attempting', 'exhausted'],  // Exhausted when the size hint rules out every strategy
  attempting: ['succeeded', 'pruning', 'demoting', 'attempting', 'aborted', 'exhausted'],
  pruning: ['attempting', 'exhausted'],
  demoting: ['attempting', 'exhausted'],
  succeeded: [],
  aborted: [],
  exhausted: [],
};

// Ascending cost: cheapest structured path first, delegated analysis last
export const STRATEGY_COST: Record<RetrievalStrategy, number> = {
  structured_api: 1,
  lightweight_query: 2,
  delegated_analysis: 3,
};

export const MAX_ATTEMPTS_PER_STRATEGY = 2;

// Size estimation (response tokens)
export const SIZE_ESTIMATION = {
  charsPerToken: 4,
  tokensPerChangedFile: 60,
  tokensPerChangedLine: 12,
  // A listed commit (40-character sha plus field names) is never smaller
  minTokensPerCommit: 16,
} as const;

// GitHub stops listing a pull request's files and commits at these counts,
// however many pages are read
export const GITHUB_LISTING_LIMITS = {
  pullFiles: 3000,
  pullCommits: 250,
} as const;

// Default capacity ceilings in estimated response tokens
export const DEFAULT_CAPACITY_CEILINGS: Record<RetrievalStrategy, number> = {
  structured_api: 25_000,
  lightweight_query: 100_000,
  delegated_analysis: Number.POSITIVE_INFINITY,
};

// GitHub CLI settings
export const GH_CLI_SETTINGS = {
  binary: 'gh',
  defaultTimeout: 2 * 60 * 1000, // 2 minutes
} as const;

// Delegated sub-agent (Claude Code CLI) settings
export const DELEGATED_AGENT_SETTINGS = {
  binary: 'claude',
  defaultFlags: ['--print', '--output-format', 'json'],
  defaultModel: 'claude-sonnet-4-20250514',
  defaultMaxTurns: 10,
  maxOutputSize: 1024 * 1024, // 1MB
  defaultTimeout: 10 * 60 * 1000, // 10 minutes
} as const;

// Retry settings
export const RETRY_SETTINGS = {
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
} as const;

export const DEFAULT_PROBE_TIMEOUT_MS = 2 * 60 * 1000;

export const CONFIG_FILE_NAMES = [
  '.waypost.yml',
  '.waypost.yaml',
  'waypost.yml',
  'waypost.yaml',
] as const;

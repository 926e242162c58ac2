/**
 * Core types for the Waypost convention and retrieval system
 */

// Ticket references
export interface TicketRef {
  key: string;      // e.g. TITAN-149
  project: string;  // e.g. TITAN
  number: number;   // e.g. 149
}

// Convention identifiers (immutable once validated)
export interface BranchName {
  readonly kind: 'branch';
  readonly value: string;
  readonly initials: string;
  readonly ticket: TicketRef;
  readonly description: string;
  readonly words: readonly string[];
}

export type CommitType =
  | 'feat'
  | 'fix'
  | 'docs'
  | 'style'
  | 'refactor'
  | 'perf'
  | 'test'
  | 'build'
  | 'ci'
  | 'chore'
  | 'revert';

export interface CommitSubject {
  readonly kind: 'commit';
  readonly value: string;
  readonly type: CommitType;
  readonly scope: string | null;
  readonly breaking: boolean;
  readonly subject: string;
}

export interface CommitMessage {
  readonly subject: CommitSubject;
  readonly body: string | null;
  readonly tickets: readonly TicketRef[];
}

export interface PRTitle {
  readonly kind: 'pr-title';
  readonly value: string;
  readonly ticket: TicketRef;
  readonly summary: string;
}

export type Identifier = BranchName | CommitSubject | PRTitle;

export type ConventionErrorCode = 'InvalidFormat' | 'LineTooLong';

// Retrieval types
export type RetrievalResource =
  | 'pr-metadata'
  | 'pr-files'
  | 'pr-diff'
  | 'commit-history'
  | 'issue'
  | 'ticket-search'
  | 'change-analysis';

export type RetrievalKey =
  | { kind: 'change'; owner: string; repo: string; number: number }
  | { kind: 'repository'; owner: string; repo: string; ref?: string }
  | { kind: 'ticket'; owner: string; repo: string; ticket: string };

export interface RetrievalRequest {
  resource: RetrievalResource;
  key: RetrievalKey;
  sizeHint?: number;  // estimated response tokens, if known in advance
}

export type RetrievalStrategy =
  | 'structured_api'
  | 'lightweight_query'
  | 'delegated_analysis';

export interface RetrievalPayload {
  strategy: RetrievalStrategy;
  resource: RetrievalResource;
  format: 'json' | 'text';
  data: unknown;
  estimatedSize: number;
}

export type RetrievalOutcome =
  | { kind: 'success'; payload: RetrievalPayload }
  | { kind: 'size_exceeded'; estimatedSize: number }
  | { kind: 'transient_failure'; cause: string }
  | { kind: 'permission_denied'; reason?: string };

export type RetrievalOutcomeKind = RetrievalOutcome['kind'];

// Fetch state machine
export type FetchState =
  | 'ranking'
  | 'attempting'
  | 'pruning'
  | 'demoting'
  | 'succeeded'
  | 'aborted'
  | 'exhausted';

export interface FetchAttempt {
  attempt: number;
  strategy: RetrievalStrategy;
  outcome: RetrievalOutcomeKind;
  durationMs: number;
}

export interface FetchReport {
  outcome: RetrievalOutcome;
  attempts: FetchAttempt[];
  state: Extract<FetchState, 'succeeded' | 'aborted' | 'exhausted'>;
  states: FetchState[];  // every state visited, in order
}

// Configuration
export interface StrategyConfig {
  enabled: boolean;
  capacityCeiling: number;  // Infinity when unbounded
}

export interface WaypostConfig {
  version: string;
  conventions: {
    projectKeys?: string[];
    initials?: string;
  };
  retrieval: {
    probeTimeoutMs: number;
    backoff: {
      initialDelayMs: number;
      maxDelayMs: number;
      multiplier: number;
    };
    strategies: {
      structuredApi: StrategyConfig;
      lightweightQuery: StrategyConfig & { binary: string };
      delegatedAnalysis: StrategyConfig & {
        binary: string;
        model: string;
        maxTurns: number;
      };
    };
  };
}

/**
 * @waypost/orchestrator - Cost-ranked retrieval with deterministic fallback
 */

export {
  QueryOrchestrator,
  FetchCancelledError,
  NoSuitableStrategyError,
  rankStrategies,
  exponentialBackoff,
  type BackoffPolicy,
  type FetchOptions,
  type QueryOrchestratorOptions,
} from './query-orchestrator.js';
export { FetchStateMachine, InvalidFetchTransitionError } from './state-machine.js';
export {
  parseRetrievalKey,
  formatRetrievalKey,
  isRetrievalResource,
  assertValidRequest,
  InvalidRetrievalRequestError,
  RESOURCE_KEY_KINDS,
  RETRIEVAL_RESOURCES,
} from './retrieval-key.js';
export { createProbes, createOrchestrator, type ProbeDependencies } from './factory.js';
export {
  createGitHubClient,
  resolveCredentials,
  MissingCredentialsError,
  type GitHubCredentials,
} from './github-client.js';
export type { CapabilityProbe, ProbeContext } from './probes/types.js';
export { StructuredApiProbe } from './probes/structured-api.js';
export { LightweightQueryProbe, type LightweightQueryProbeOptions } from './probes/lightweight-query.js';
export { DelegatedAnalysisProbe, type DelegatedAnalysisProbeOptions } from './probes/delegated-analysis.js';
export { createOctokitApi, type GitHubApi } from './probes/github-api.js';

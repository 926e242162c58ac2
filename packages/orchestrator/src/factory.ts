/**
 * Builds the probe set and orchestrator from configuration
 */

import { createLogger, type WaypostConfig } from '@waypost/core';
import type { CommandRunner } from '@waypost/agents';
import type { GitHubApi } from './probes/github-api.js';
import type { CapabilityProbe } from './probes/types.js';
import { StructuredApiProbe } from './probes/structured-api.js';
import { LightweightQueryProbe } from './probes/lightweight-query.js';
import { DelegatedAnalysisProbe } from './probes/delegated-analysis.js';
import { QueryOrchestrator, exponentialBackoff } from './query-orchestrator.js';

const logger = createLogger('orchestrator-factory');

export interface ProbeDependencies {
  /** Structured API access; the strategy is skipped without it */
  github?: GitHubApi | null;
  runner?: CommandRunner;
  workDir?: string;
}

export function createProbes(
  config: WaypostConfig,
  deps: ProbeDependencies = {}
): CapabilityProbe[] {
  const { strategies, probeTimeoutMs } = config.retrieval;
  const probes: CapabilityProbe[] = [];

  if (strategies.structuredApi.enabled) {
    if (deps.github) {
      probes.push(new StructuredApiProbe(deps.github, strategies.structuredApi.capacityCeiling));
    } else {
      logger.warn('No GitHub credentials, skipping the structured API strategy');
    }
  }

  if (strategies.lightweightQuery.enabled) {
    probes.push(
      new LightweightQueryProbe({
        binary: strategies.lightweightQuery.binary,
        capacityCeiling: strategies.lightweightQuery.capacityCeiling,
        timeout: probeTimeoutMs,
        runner: deps.runner,
      })
    );
  }

  if (strategies.delegatedAnalysis.enabled) {
    probes.push(
      new DelegatedAnalysisProbe({
        binary: strategies.delegatedAnalysis.binary,
        model: strategies.delegatedAnalysis.model,
        maxTurns: strategies.delegatedAnalysis.maxTurns,
        capacityCeiling: strategies.delegatedAnalysis.capacityCeiling,
        timeout: probeTimeoutMs,
        workDir: deps.workDir,
        runner: deps.runner,
      })
    );
  }

  return probes;
}

export function createOrchestrator(
  config: WaypostConfig,
  deps: ProbeDependencies = {}
): QueryOrchestrator {
  return new QueryOrchestrator({
    probes: createProbes(config, deps),
    backoff: exponentialBackoff(config.retrieval.backoff),
    probeTimeoutMs: config.retrieval.probeTimeoutMs,
  });
}

/**
 * Delegated Analysis Probe
 *
 * Hands the retrieval to a Claude Code sub-agent that fetches the data itself
 * and returns a condensed answer. Most expensive path, effectively unbounded.
 */

import {
  createLogger,
  DEFAULT_CAPACITY_CEILINGS,
  DELEGATED_AGENT_SETTINGS,
  estimateTokens,
  truncate,
  type RetrievalOutcome,
  type RetrievalRequest,
} from '@waypost/core';
import { ClaudeRunner, type AgentOutput, type CommandRunner } from '@waypost/agents';
import {
  ACCESS_DENIED_MARKER,
  DELEGATED_ANALYSIS_SYSTEM_PROMPT,
  RETRIEVAL_FAILED_MARKER,
  TOO_LARGE_MARKER,
  buildRetrievalPrompt,
} from '../prompts/delegated-analysis.js';
import {
  errorMessage,
  oversizeEstimate,
  payloadOutcome,
  permissionDenied,
  sizeExceeded,
  transientFailure,
} from './outcome.js';
import type { CapabilityProbe, ProbeContext } from './types.js';

const logger = createLogger('probe:delegated-analysis');

// Read-only tools for the sub-agent
const ALLOWED_TOOLS = ['Bash(gh:*)', 'Bash(git log:*)', 'Bash(git show:*)', 'Read', 'Grep', 'Glob'];

export interface DelegatedAnalysisProbeOptions {
  binary?: string;
  model?: string;
  maxTurns?: number;
  capacityCeiling?: number;
  timeout?: number;
  workDir?: string;
  runner?: CommandRunner;
}

export class DelegatedAnalysisProbe implements CapabilityProbe {
  readonly strategy = 'delegated_analysis' as const;
  readonly capacityCeiling: number;

  constructor(private options: DelegatedAnalysisProbeOptions = {}) {
    this.capacityCeiling = options.capacityCeiling ?? DEFAULT_CAPACITY_CEILINGS.delegated_analysis;
  }

  supports(): boolean {
    return true;
  }

  async invoke(request: RetrievalRequest, context: ProbeContext): Promise<RetrievalOutcome> {
    const runner = new ClaudeRunner({
      prompt: buildRetrievalPrompt(request, this.capacityCeiling),
      systemPrompt: DELEGATED_ANALYSIS_SYSTEM_PROMPT,
      binary: this.options.binary,
      model: this.options.model ?? DELEGATED_AGENT_SETTINGS.defaultModel,
      maxTurns: this.options.maxTurns ?? DELEGATED_AGENT_SETTINGS.defaultMaxTurns,
      timeout: this.options.timeout,
      workDir: this.options.workDir,
      allowedTools: ALLOWED_TOOLS,
      runner: this.options.runner,
    });

    let output: AgentOutput;
    try {
      output = await runner.run(context.signal);
    } catch (err) {
      if (context.signal.aborted) throw err;
      return transientFailure(errorMessage(err));
    }

    return this.toOutcome(output, request);
  }

  private toOutcome(output: AgentOutput, request: RetrievalRequest): RetrievalOutcome {
    if (output.truncated) {
      return sizeExceeded(oversizeEstimate(this.capacityCeiling, request));
    }

    if (output.timedOut) {
      return transientFailure('sub-agent timed out');
    }

    const reply = output.result.trim();

    if (reply.startsWith(ACCESS_DENIED_MARKER)) {
      return permissionDenied(reply.slice(ACCESS_DENIED_MARKER.length).trim() || undefined);
    }

    if (reply.startsWith(TOO_LARGE_MARKER)) {
      const reported = Number.parseInt(reply.slice(TOO_LARGE_MARKER.length).trim(), 10);
      return sizeExceeded(
        Number.isFinite(reported) ? reported : oversizeEstimate(this.capacityCeiling, request)
      );
    }

    if (reply.startsWith(RETRIEVAL_FAILED_MARKER)) {
      return transientFailure(reply.slice(RETRIEVAL_FAILED_MARKER.length).trim());
    }

    if (!output.success || reply === '') {
      logger.warn(
        { exitCode: output.exitCode, isError: output.isError, stderr: truncate(output.stderr, 200) },
        'Sub-agent failed'
      );
      return transientFailure(
        output.isError && reply ? reply : `sub-agent exited with code ${output.exitCode}`
      );
    }

    logger.debug({ resultTokens: estimateTokens(reply) }, 'Sub-agent answered');
    return payloadOutcome(this.strategy, request, 'text', reply, this.capacityCeiling);
  }
}

import type {
  RetrievalOutcome,
  RetrievalRequest,
  RetrievalStrategy,
} from '@waypost/core';
import type { CommandResult } from '@waypost/agents';
import type { CapabilityProbe, ProbeContext } from '../probes/types.js';

export function success(strategy: RetrievalStrategy, data: unknown = { ok: true }): RetrievalOutcome {
  return {
    kind: 'success',
    payload: { strategy, resource: 'pr-files', format: 'json', data, estimatedSize: 10 },
  };
}

export const transient: RetrievalOutcome = { kind: 'transient_failure', cause: 'HTTP 502' };
export const denied: RetrievalOutcome = { kind: 'permission_denied', reason: 'forbidden' };

export function tooLarge(estimatedSize: number): RetrievalOutcome {
  return { kind: 'size_exceeded', estimatedSize };
}

type Step = RetrievalOutcome | ((context: ProbeContext) => Promise<RetrievalOutcome>);

/**
 * Probe that replays a script of outcomes; the last step repeats
 */
export class ScriptedProbe implements CapabilityProbe {
  calls = 0;
  signals: AbortSignal[] = [];
  returned: RetrievalOutcome[] = [];

  constructor(
    readonly strategy: RetrievalStrategy,
    readonly capacityCeiling: number,
    private script: Step[],
    private resources: RetrievalRequest['resource'][] | null = null,
    private log: RetrievalStrategy[] = []
  ) {}

  supports(request: RetrievalRequest): boolean {
    return this.resources === null || this.resources.includes(request.resource);
  }

  async invoke(_request: RetrievalRequest, context: ProbeContext): Promise<RetrievalOutcome> {
    const step = this.script[Math.min(this.calls, this.script.length - 1)];
    this.calls++;
    this.signals.push(context.signal);
    this.log.push(this.strategy);
    const outcome = typeof step === 'function' ? await step(context) : step;
    this.returned.push(outcome);
    return outcome;
  }
}

export const noBackoff = { delayFor: () => 0 };

export function prFilesRequest(sizeHint?: number): RetrievalRequest {
  return {
    resource: 'pr-files',
    key: { kind: 'change', owner: 'org', repo: 'repo', number: 42 },
    sizeHint,
  };
}

export function commandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return {
    exitCode: 0,
    stdout: '',
    stderr: '',
    truncated: false,
    timedOut: false,
    duration: 5,
    ...overrides,
  };
}

export function probeContext(): ProbeContext {
  return { signal: new AbortController().signal };
}

/**
 * Query Orchestrator
 *
 * Picks the cheapest retrieval strategy that can serve a request and falls
 * back deterministically:
 * - size_exceeded prunes every strategy whose ceiling is at or below the estimate
 * - transient_failure retries the same strategy once, then demotes it
 * - permission_denied aborts at once
 *
 * Attempts within one fetch are strictly sequential.
 */

import {
  backoffDelay,
  createFetchLogger,
  DEFAULT_PROBE_TIMEOUT_MS,
  generateShortId,
  MAX_ATTEMPTS_PER_STRATEGY,
  sleep,
  STRATEGY_COST,
  type BackoffOptions,
  type FetchAttempt,
  type FetchReport,
  type Logger,
  type RetrievalOutcome,
  type RetrievalRequest,
} from '@waypost/core';
import type { CapabilityProbe } from './probes/types.js';
import { errorMessage, transientFailure } from './probes/outcome.js';
import { assertValidRequest, formatRetrievalKey } from './retrieval-key.js';
import { FetchStateMachine } from './state-machine.js';

export interface BackoffPolicy {
  /** Delay before the nth retry of a strategy (0-based) */
  delayFor(retryIndex: number): number;
}

export function exponentialBackoff(options: BackoffOptions = {}): BackoffPolicy {
  return {
    delayFor: (retryIndex) => backoffDelay(retryIndex, options),
  };
}

export interface QueryOrchestratorOptions {
  probes: CapabilityProbe[];
  backoff?: BackoffPolicy;
  probeTimeoutMs?: number;
}

export interface FetchOptions {
  signal?: AbortSignal;
  /** Overrides the orchestrator's per-probe timeout for this fetch */
  probeTimeoutMs?: number;
}

export class FetchCancelledError extends Error {
  constructor(
    public request: RetrievalRequest,
    public reason: unknown
  ) {
    super(`Fetch of ${request.resource} for ${formatRetrievalKey(request.key)} was cancelled`);
    this.name = 'FetchCancelledError';
  }
}

export class NoSuitableStrategyError extends Error {
  constructor(public request: RetrievalRequest) {
    super(`No enabled retrieval strategy supports ${request.resource}`);
    this.name = 'NoSuitableStrategyError';
  }
}

/**
 * Probes that can serve the request, cheapest first. A size hint above a
 * probe's ceiling rules that probe out before any attempt is made.
 */
export function rankStrategies(
  probes: CapabilityProbe[],
  request: RetrievalRequest
): CapabilityProbe[] {
  const { sizeHint } = request;

  return probes
    .filter((probe) => probe.supports(request))
    .filter((probe) => sizeHint === undefined || sizeHint <= probe.capacityCeiling)
    .sort((a, b) => STRATEGY_COST[a.strategy] - STRATEGY_COST[b.strategy]);
}

/**
 * Settle with the promise, or reject as soon as the signal aborts
 */
function withAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(signal.reason);

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

export class QueryOrchestrator {
  private probes: CapabilityProbe[];
  private backoff: BackoffPolicy;
  private probeTimeoutMs: number;

  constructor(options: QueryOrchestratorOptions) {
    const strategies = options.probes.map((probe) => probe.strategy);
    if (new Set(strategies).size !== strategies.length) {
      throw new Error(`Duplicate retrieval strategies: ${strategies.join(', ')}`);
    }

    this.probes = [...options.probes];
    this.backoff = options.backoff ?? exponentialBackoff();
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  }

  async fetch(request: RetrievalRequest, options: FetchOptions = {}): Promise<RetrievalOutcome> {
    const report = await this.fetchWithTrace(request, options);
    return report.outcome;
  }

  async fetchWithTrace(
    request: RetrievalRequest,
    options: FetchOptions = {}
  ): Promise<FetchReport> {
    assertValidRequest(request);

    if (!this.probes.some((probe) => probe.supports(request))) {
      throw new NoSuitableStrategyError(request);
    }

    const logger = createFetchLogger(generateShortId(), request.resource);
    const machine = new FetchStateMachine(logger);
    const attempts: FetchAttempt[] = [];
    const timeoutMs = options.probeTimeoutMs ?? this.probeTimeoutMs;

    const report = (outcome: RetrievalOutcome, state: FetchReport['state']): FetchReport => {
      const finalState = machine.finish(state);
      logger.info(
        { state: finalState, outcome: outcome.kind, attempts: attempts.length },
        'Fetch finished'
      );
      return { outcome, attempts, state: finalState, states: machine.history };
    };

    let remaining = rankStrategies(this.probes, request);

    logger.info(
      {
        key: formatRetrievalKey(request.key),
        sizeHint: request.sizeHint,
        ranking: remaining.map((probe) => probe.strategy),
      },
      'Ranked retrieval strategies'
    );

    if (remaining.length === 0) {
      // Only reachable through the size hint: every suitable probe is too small
      return report({ kind: 'size_exceeded', estimatedSize: request.sizeHint ?? 0 }, 'exhausted');
    }

    let current = remaining[0];
    let consecutiveTransient = 0;
    let largestEstimate = 0;

    machine.transition('attempting');

    for (;;) {
      const outcome = await this.attempt(current, request, attempts, timeoutMs, logger, options.signal);

      switch (outcome.kind) {
        case 'success':
          return report(outcome, 'succeeded');

        case 'permission_denied':
          return report(outcome, 'aborted');

        case 'size_exceeded': {
          largestEstimate = Math.max(largestEstimate, outcome.estimatedSize);
          const failed = current;
          remaining = remaining.filter(
            (probe) => probe !== failed && probe.capacityCeiling > largestEstimate
          );
          consecutiveTransient = 0;

          if (remaining.length === 0) {
            return report(outcome, 'exhausted');
          }

          logger.info(
            { estimatedSize: largestEstimate, remaining: remaining.map((p) => p.strategy) },
            'Pruned strategies by capacity'
          );
          machine.transition('pruning');
          break;
        }

        case 'transient_failure': {
          consecutiveTransient++;

          if (consecutiveTransient < MAX_ATTEMPTS_PER_STRATEGY) {
            const delay = this.backoff.delayFor(consecutiveTransient - 1);
            logger.info({ strategy: current.strategy, delay, cause: outcome.cause }, 'Retrying strategy');
            await this.wait(delay, request, options.signal);
            machine.transition('attempting');
            continue;
          }

          const failed = current;
          remaining = remaining.filter((probe) => probe !== failed);
          consecutiveTransient = 0;

          if (remaining.length === 0) {
            return report(outcome, 'exhausted');
          }

          logger.info(
            { demoted: failed.strategy, next: remaining[0].strategy },
            'Demoted strategy after repeated transient failures'
          );
          machine.transition('demoting');
          break;
        }
      }

      current = remaining[0];
      machine.transition('attempting');
    }
  }

  private async attempt(
    probe: CapabilityProbe,
    request: RetrievalRequest,
    attempts: FetchAttempt[],
    timeoutMs: number,
    logger: Logger,
    signal?: AbortSignal
  ): Promise<RetrievalOutcome> {
    if (signal?.aborted) {
      throw new FetchCancelledError(request, signal.reason);
    }

    const controller = new AbortController();
    const onCancel = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onCancel, { once: true });
    const timer = setTimeout(
      () => controller.abort(new Error(`Probe timed out after ${timeoutMs}ms`)),
      timeoutMs
    );

    const startTime = Date.now();
    let outcome: RetrievalOutcome;

    try {
      outcome = await withAbort(
        probe.invoke(request, { signal: controller.signal }),
        controller.signal
      );
    } catch (err) {
      if (signal?.aborted) {
        throw new FetchCancelledError(request, signal.reason);
      }

      outcome = controller.signal.aborted
        ? transientFailure(`${probe.strategy} timed out after ${timeoutMs}ms`)
        : transientFailure(errorMessage(err));

      logger.warn({ err, strategy: probe.strategy }, 'Probe threw');
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCancel);
    }

    const record: FetchAttempt = {
      attempt: attempts.length + 1,
      strategy: probe.strategy,
      outcome: outcome.kind,
      durationMs: Date.now() - startTime,
    };
    attempts.push(record);

    logger.info(record, 'Retrieval attempt finished');
    return outcome;
  }

  private async wait(ms: number, request: RetrievalRequest, signal?: AbortSignal): Promise<void> {
    try {
      await sleep(ms, signal);
    } catch (err) {
      throw new FetchCancelledError(request, err);
    }
  }
}

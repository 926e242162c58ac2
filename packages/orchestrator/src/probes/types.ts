/**
 * Capability probes: the way each retrieval strategy is actually executed
 */

import type { RetrievalOutcome, RetrievalRequest, RetrievalStrategy } from '@waypost/core';

export interface ProbeContext {
  /** Aborted on caller cancellation or probe timeout */
  signal: AbortSignal;
}

export interface CapabilityProbe {
  readonly strategy: RetrievalStrategy;
  /** Largest response, in estimated tokens, this probe handles reliably */
  readonly capacityCeiling: number;
  supports(request: RetrievalRequest): boolean;
  invoke(request: RetrievalRequest, context: ProbeContext): Promise<RetrievalOutcome>;
}

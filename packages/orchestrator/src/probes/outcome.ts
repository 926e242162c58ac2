/**
 * Outcome constructors and error classification shared by the probes
 */

import {
  estimatePayloadSize,
  type RetrievalOutcome,
  type RetrievalPayload,
  type RetrievalRequest,
  type RetrievalStrategy,
} from '@waypost/core';

export function sizeExceeded(estimatedSize: number): RetrievalOutcome {
  return { kind: 'size_exceeded', estimatedSize };
}

export function transientFailure(cause: string): RetrievalOutcome {
  return { kind: 'transient_failure', cause };
}

export function permissionDenied(reason?: string): RetrievalOutcome {
  return { kind: 'permission_denied', reason };
}

/**
 * Wrap retrieved data, reporting size_exceeded when it is over the ceiling
 */
export function payloadOutcome(
  strategy: RetrievalStrategy,
  request: RetrievalRequest,
  format: RetrievalPayload['format'],
  data: unknown,
  capacityCeiling: number
): RetrievalOutcome {
  const estimatedSize = estimatePayloadSize(data);
  if (estimatedSize > capacityCeiling) {
    return sizeExceeded(estimatedSize);
  }

  return {
    kind: 'success',
    payload: { strategy, resource: request.resource, format, data, estimatedSize },
  };
}

/**
 * Size estimate for a response that was refused or cut off before it could be
 * measured: at least past this probe's ceiling, and no less than the hint.
 */
export function oversizeEstimate(capacityCeiling: number, request: RetrievalRequest): number {
  const pastCeiling = Number.isFinite(capacityCeiling) ? capacityCeiling + 1 : 0;
  return Math.max(pastCeiling, request.sizeHint ?? 0);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function httpStatus(err: unknown): number | null {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return null;
}

function responseHeader(err: unknown, name: string): string | null {
  if (typeof err !== 'object' || err === null || !('response' in err)) return null;
  const response = err.response;
  if (typeof response !== 'object' || response === null || !('headers' in response)) return null;
  const headers = response.headers;
  if (typeof headers !== 'object' || headers === null) return null;
  const value: unknown = Reflect.get(headers, name);
  return typeof value === 'string' || typeof value === 'number' ? String(value) : null;
}

const TOO_LARGE = /too large|too many|exceeded|maximum/i;
const RATE_LIMITED = /rate limit/i;

/**
 * Map a GitHub REST error to a retrieval outcome
 */
export function classifyHttpError(
  err: unknown,
  capacityCeiling: number,
  request: RetrievalRequest
): RetrievalOutcome {
  const status = httpStatus(err);
  const message = errorMessage(err);

  if (status === null) {
    return transientFailure(message);
  }

  if (status === 429 || (status === 403 && (responseHeader(err, 'x-ratelimit-remaining') === '0' || RATE_LIMITED.test(message)))) {
    return transientFailure(`rate limited: ${message}`);
  }

  if (status === 401) {
    return permissionDenied('unauthenticated');
  }

  if (status === 403) {
    return permissionDenied(`forbidden: ${message}`);
  }

  if (status === 404) {
    // GitHub answers 404 for private resources the credentials cannot see
    return permissionDenied('not found or not accessible');
  }

  if ((status === 406 || status === 422) && TOO_LARGE.test(message)) {
    return sizeExceeded(oversizeEstimate(capacityCeiling, request));
  }

  return transientFailure(`HTTP ${status}: ${message}`);
}

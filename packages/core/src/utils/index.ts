/**
 * Shared utilities
 */

import { randomBytes } from 'crypto';
import { RETRY_SETTINGS, SIZE_ESTIMATION } from '../constants/index.js';

/**
 * Generate a short ID for correlating log lines
 */
export function generateShortId(length = 8): string {
  return randomBytes(length).toString('hex').slice(0, length);
}

/**
 * Sleep for a given number of milliseconds. Rejects with the signal's
 * reason if the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface BackoffOptions {
  initialDelayMs?: number;
  maxDelayMs?: number;
  multiplier?: number;
}

/**
 * Exponential backoff delay for the nth retry (0-based)
 */
export function backoffDelay(retryIndex: number, options: BackoffOptions = {}): number {
  const {
    initialDelayMs = RETRY_SETTINGS.initialDelayMs,
    maxDelayMs = RETRY_SETTINGS.maxDelayMs,
    multiplier = RETRY_SETTINGS.backoffMultiplier,
  } = options;

  return Math.min(initialDelayMs * Math.pow(multiplier, retryIndex), maxDelayMs);
}

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Estimate the token size of a response body
 */
export function estimateTokens(content: string): number {
  return Math.ceil(content.length / SIZE_ESTIMATION.charsPerToken);
}

/**
 * Estimate the token size of a serialized value
 */
export function estimatePayloadSize(data: unknown): number {
  if (typeof data === 'string') return estimateTokens(data);
  return estimateTokens(JSON.stringify(data) ?? '');
}

/**
 * Estimate the size of a change set's file listing or diff from its stats
 */
export function sizeHintFromChangeStats(stats: {
  changedFiles: number;
  additions?: number;
  deletions?: number;
}): number {
  const changedLines = (stats.additions ?? 0) + (stats.deletions ?? 0);
  return (
    stats.changedFiles * SIZE_ESTIMATION.tokensPerChangedFile +
    changedLines * SIZE_ESTIMATION.tokensPerChangedLine
  );
}

/**
 * Format duration in milliseconds to human readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  if (ms < 3600000) return `${(ms / 60000).toFixed(1)}m`;
  return `${(ms / 3600000).toFixed(1)}h`;
}

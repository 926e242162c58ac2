/**
 * Retrieval keys and request validation
 */

import {
  TICKET_PATTERN_SOURCE,
  type RetrievalKey,
  type RetrievalRequest,
  type RetrievalResource,
} from '@waypost/core';

// Key kinds each resource can be looked up by
export const RESOURCE_KEY_KINDS: Record<RetrievalResource, RetrievalKey['kind'][]> = {
  'pr-metadata': ['change'],
  'pr-files': ['change'],
  'pr-diff': ['change'],
  'commit-history': ['repository', 'change'],
  issue: ['change'],
  'ticket-search': ['ticket'],
  'change-analysis': ['change'],
};

export const RETRIEVAL_RESOURCES: RetrievalResource[] = [
  'pr-metadata',
  'pr-files',
  'pr-diff',
  'commit-history',
  'issue',
  'ticket-search',
  'change-analysis',
];

export class InvalidRetrievalRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRetrievalRequestError';
  }
}

const REPO_SEGMENT = '[A-Za-z0-9_.-]+';
const KEY_PATTERN = new RegExp(`^(${REPO_SEGMENT})/(${REPO_SEGMENT})(?:([#@])(.+))?$`);
const TICKET = new RegExp(`^${TICKET_PATTERN_SOURCE}$`);

/**
 * Parse "owner/repo#42", "owner/repo", "owner/repo@ref" or "owner/repo#PROJ-12"
 */
export function parseRetrievalKey(raw: string): RetrievalKey {
  const value = raw.trim();
  const match = KEY_PATTERN.exec(value);
  if (!match) {
    throw new InvalidRetrievalRequestError(`Invalid retrieval key: "${value}"`);
  }

  const [, owner, repo, marker, suffix] = match;

  if (marker === undefined) {
    return { kind: 'repository', owner, repo };
  }

  if (marker === '@') {
    return { kind: 'repository', owner, repo, ref: suffix };
  }

  if (/^\d+$/.test(suffix)) {
    return { kind: 'change', owner, repo, number: Number.parseInt(suffix, 10) };
  }

  if (TICKET.test(suffix)) {
    return { kind: 'ticket', owner, repo, ticket: suffix.toUpperCase() };
  }

  throw new InvalidRetrievalRequestError(
    `Expected a number or ticket key after "#": "${value}"`
  );
}

export function formatRetrievalKey(key: RetrievalKey): string {
  const base = `${key.owner}/${key.repo}`;
  switch (key.kind) {
    case 'change':
      return `${base}#${key.number}`;
    case 'ticket':
      return `${base}#${key.ticket}`;
    case 'repository':
      return key.ref ? `${base}@${key.ref}` : base;
  }
}

export function isRetrievalResource(value: string): value is RetrievalResource {
  return RETRIEVAL_RESOURCES.some((resource) => resource === value);
}

/**
 * Throws when the key cannot address the resource or the size hint is malformed
 */
export function assertValidRequest(request: RetrievalRequest): void {
  const kinds = RESOURCE_KEY_KINDS[request.resource];
  if (!kinds.includes(request.key.kind)) {
    throw new InvalidRetrievalRequestError(
      `${request.resource} needs a ${kinds.join(' or ')} key, got ${formatRetrievalKey(request.key)}`
    );
  }

  if (
    request.sizeHint !== undefined &&
    (!Number.isFinite(request.sizeHint) || request.sizeHint < 0)
  ) {
    throw new InvalidRetrievalRequestError(`Invalid size hint: ${request.sizeHint}`);
  }
}

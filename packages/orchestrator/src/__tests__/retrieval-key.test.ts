import { describe, it, expect } from 'vitest';
import {
  InvalidRetrievalRequestError,
  assertValidRequest,
  formatRetrievalKey,
  isRetrievalResource,
  parseRetrievalKey,
} from '../retrieval-key.js';

describe('parseRetrievalKey', () => {
  it('parses a pull request key', () => {
    expect(parseRetrievalKey('org/repo#42')).toEqual({
      kind: 'change',
      owner: 'org',
      repo: 'repo',
      number: 42,
    });
  });

  it('parses a repository with and without a ref', () => {
    expect(parseRetrievalKey('org/repo')).toEqual({ kind: 'repository', owner: 'org', repo: 'repo' });
    expect(parseRetrievalKey('org/repo@release/1.2')).toEqual({
      kind: 'repository',
      owner: 'org',
      repo: 'repo',
      ref: 'release/1.2',
    });
  });

  it('parses and uppercases a ticket key', () => {
    expect(parseRetrievalKey(' org/repo#titan-149 ')).toEqual({
      kind: 'ticket',
      owner: 'org',
      repo: 'repo',
      ticket: 'TITAN-149',
    });
  });

  it.each(['repo', 'org/repo/extra', 'org/repo#', 'org/repo#not a ticket', ''])(
    'rejects %j',
    (raw) => {
      expect(() => parseRetrievalKey(raw)).toThrow(InvalidRetrievalRequestError);
    }
  );

  it('formats keys back', () => {
    for (const raw of ['org/repo#42', 'org/repo', 'org/repo@main', 'org/repo#TITAN-149']) {
      expect(formatRetrievalKey(parseRetrievalKey(raw))).toBe(raw);
    }
  });
});

describe('isRetrievalResource', () => {
  it('recognizes known resources only', () => {
    expect(isRetrievalResource('pr-files')).toBe(true);
    expect(isRetrievalResource('change-analysis')).toBe(true);
    expect(isRetrievalResource('PR files')).toBe(false);
  });
});

describe('assertValidRequest', () => {
  const change = { kind: 'change', owner: 'org', repo: 'repo', number: 42 } as const;

  it('accepts a key the resource can be looked up by', () => {
    expect(() => assertValidRequest({ resource: 'pr-files', key: change, sizeHint: 0 })).not.toThrow();
    expect(() =>
      assertValidRequest({
        resource: 'commit-history',
        key: { kind: 'repository', owner: 'org', repo: 'repo' },
      })
    ).not.toThrow();
  });

  it('rejects a mismatched key', () => {
    expect(() =>
      assertValidRequest({
        resource: 'ticket-search',
        key: change,
      })
    ).toThrow('ticket-search needs a ticket key, got org/repo#42');
  });

  it.each([-1, Number.NaN, Number.POSITIVE_INFINITY])('rejects size hint %s', (sizeHint) => {
    expect(() => assertValidRequest({ resource: 'pr-files', key: change, sizeHint })).toThrow(
      InvalidRetrievalRequestError
    );
  });
});

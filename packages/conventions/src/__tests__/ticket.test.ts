import { describe, it, expect } from 'vitest';
import { extractTicketReference, extractTicketReferences, parseTicket } from '../ticket.js';

describe('extractTicketReference', () => {
  it('finds the first ticket and uppercases it', () => {
    expect(extractTicketReference('working on titan-149 and OPS-2')).toEqual({
      key: 'TITAN-149',
      project: 'TITAN',
      number: 149,
    });
  });

  it('detects tickets inside branch names', () => {
    expect(extractTicketReference('sp/titan-149-pii-service')?.key).toBe('TITAN-149');
  });

  it('returns null when no ticket is present', () => {
    expect(extractTicketReference('fix: handle empty input')).toBeNull();
    expect(extractTicketReference('')).toBeNull();
  });

  it('ignores keys glued to other word characters', () => {
    expect(extractTicketReference('abc1-22 TITAN-9x')).toBeNull();
  });

  it.each(['TITAN-149', 'titan-149', 'Ops-7', 'see DATA-0042 please'])(
    'is idempotent on its own output for %s',
    (text) => {
      const first = extractTicketReference(text);
      expect(first).not.toBeNull();
      if (first) {
        expect(extractTicketReference(first.key)).toEqual(first);
      }
    }
  );

  it('honours the project allowlist', () => {
    const text = 'UTF-8 encoding for TITAN-3';
    expect(extractTicketReference(text)?.key).toBe('UTF-8');
    expect(extractTicketReference(text, { projectKeys: ['titan'] })?.key).toBe('TITAN-3');
    expect(extractTicketReference(text, { projectKeys: ['OPS'] })).toBeNull();
  });
});

describe('extractTicketReferences', () => {
  it('returns distinct tickets in order of appearance', () => {
    const keys = extractTicketReferences('OPS-2, titan-1, ops-2, TITAN-10').map((t) => t.key);
    expect(keys).toEqual(['OPS-2', 'TITAN-1', 'TITAN-10']);
  });
});

describe('parseTicket', () => {
  it('accepts exactly one ticket key', () => {
    expect(parseTicket(' titan-149 ')?.key).toBe('TITAN-149');
    expect(parseTicket('TITAN-149 extra')).toBeNull();
    expect(parseTicket('TITAN')).toBeNull();
    expect(parseTicket('149')).toBeNull();
  });
});

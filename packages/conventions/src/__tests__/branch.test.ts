import { describe, it, expect } from 'vitest';
import { buildBranchName, slugify, validateBranchName } from '../branch.js';

function ruleOf(raw: string): string | null {
  const result = validateBranchName(raw);
  return result.ok ? null : result.error.rule;
}

describe('validateBranchName', () => {
  it('accepts a well-formed branch name', () => {
    const result = validateBranchName('sp/titan-149-pii-service');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.kind).toBe('branch');
      expect(result.value.value).toBe('sp/titan-149-pii-service');
      expect(result.value.initials).toBe('sp');
      expect(result.value.ticket).toEqual({ key: 'TITAN-149', project: 'TITAN', number: 149 });
      expect(result.value.description).toBe('pii-service');
      expect(result.value.words).toEqual(['pii', 'service']);
    }
  });

  it.each([
    ['ab/abc-1-two-words', 'ABC-1'],
    ['x/Proj-42-add-login-page', 'PROJ-42'],
    ['abcd/OPS-7-fix-retry-loop-in-worker', 'OPS-7'],
    ['jd/data-1000-one-two-three-four-five-six', 'DATA-1000'],
  ])('normalizes the ticket of %s to %s', (raw, ticket) => {
    const result = validateBranchName(raw);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.ticket.key).toBe(ticket);
    }
  });

  it('trims surrounding whitespace', () => {
    const result = validateBranchName('  sp/titan-149-pii-service\n');
    expect(result.ok && result.value.value).toBe('sp/titan-149-pii-service');
  });

  it('rejects uppercase initials', () => {
    const result = validateBranchName('SP/titan-149-pii-service');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('InvalidFormat');
      expect(result.error.rule).toBe('initials');
      expect(result.error.message).toBe('Initials must be 1-4 lowercase letters: "SP"');
    }
  });

  it('names the first violated rule', () => {
    expect(ruleOf('titan-149-pii-service')).toBe('structure');
    expect(ruleOf('sp/feature/titan-149-pii')).toBe('structure');
    expect(ruleOf('/titan-149-pii-service')).toBe('initials');
    expect(ruleOf('abcde/titan-149-pii-service')).toBe('initials');
    expect(ruleOf('s1/titan-149-pii-service')).toBe('initials');
    expect(ruleOf('sp/pii-service')).toBe('ticket');
    expect(ruleOf('sp/titan149-pii-service')).toBe('ticket');
    expect(ruleOf('sp/titan-149')).toBe('description');
    expect(ruleOf('sp/titan-149-')).toBe('description');
    expect(ruleOf('sp/titan-149-PII-service')).toBe('description');
    expect(ruleOf('sp/titan-149-pii_service')).toBe('description');
    expect(ruleOf('sp/titan-149-pii--service')).toBe('description');
    expect(ruleOf('sp/titan-149-service')).toBe('description-words');
    expect(ruleOf('sp/titan-149-a-b-c-d-e-f-g')).toBe('description-words');
  });

  it('returns frozen identifiers', () => {
    const result = validateBranchName('sp/titan-149-pii-service');
    expect(result.ok && Object.isFrozen(result.value)).toBe(true);
  });
});

describe('slugify', () => {
  it('lowercases and joins words with hyphens', () => {
    expect(slugify('Add PII Service!')).toBe('add-pii-service');
    expect(slugify('  --Retry__loop  ')).toBe('retry-loop');
  });

  it('keeps at most the word limit', () => {
    expect(slugify('one two three four five six seven eight')).toBe(
      'one-two-three-four-five-six'
    );
  });
});

describe('buildBranchName', () => {
  it('renders and validates a branch name', () => {
    const result = buildBranchName({
      initials: 'sp',
      ticket: 'TITAN-149',
      summary: 'PII detection service',
    });

    expect(result.ok && result.value.value).toBe('sp/titan-149-pii-detection-service');
  });

  it('does not coerce initials', () => {
    const result = buildBranchName({ initials: 'SP', ticket: 'TITAN-149', summary: 'pii service' });
    expect(!result.ok && result.error.rule).toBe('initials');
  });

  it('rejects a ticket that is not a ticket key', () => {
    const result = buildBranchName({ initials: 'sp', ticket: 'TITAN', summary: 'pii service' });
    expect(!result.ok && result.error.rule).toBe('ticket');
  });

  it('names the key of a malformed ticket reference', () => {
    const result = buildBranchName({
      initials: 'sp',
      ticket: { key: 'titan 149', project: 'titan', number: 149 },
      summary: 'pii service',
    });
    expect(!result.ok && result.error.message).toBe('Not a ticket key: "titan 149"');
  });

  it('fails when the summary has a single word', () => {
    const result = buildBranchName({ initials: 'sp', ticket: 'TITAN-149', summary: 'cleanup' });
    expect(!result.ok && result.error.rule).toBe('description-words');
  });
});

import { describe, it, expect } from 'vitest';
import { COMMIT_TYPES } from '@waypost/core';
import { validateCommitMessage, validateCommitSubject } from '../commit.js';

describe('validateCommitSubject', () => {
  it('parses type, scope and subject', () => {
    const result = validateCommitSubject('feat(detection): add support for custom PII patterns');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual({
        kind: 'commit',
        value: 'feat(detection): add support for custom PII patterns',
        type: 'feat',
        scope: 'detection',
        breaking: false,
        subject: 'add support for custom PII patterns',
      });
    }
  });

  it.each(COMMIT_TYPES.map((type) => [type]))('accepts the %s type', (type) => {
    expect(validateCommitSubject(`${type}: update things`).ok).toBe(true);
  });

  it('accepts the breaking change marker', () => {
    const result = validateCommitSubject('refactor(api)!: drop v1 endpoints');
    expect(result.ok && result.value.breaking).toBe(true);
    expect(result.ok && result.value.scope).toBe('api');
  });

  it('rejects a trailing period', () => {
    const result = validateCommitSubject('feat(detection): add support for custom PII patterns.');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('InvalidFormat');
      expect(result.error.rule).toBe('trailing-period');
    }
  });

  it('rejects unknown and miscased types', () => {
    for (const raw of ['feature: add login', 'Feat: add login', 'wip: add login']) {
      const result = validateCommitSubject(raw);
      expect(!result.ok && result.error.rule).toBe('type');
    }
  });

  it('rejects broken grammar', () => {
    const cases: Array<[string, string]> = [
      ['add login page', 'structure'],
      ['feat:add login page', 'structure'],
      ['feat(): add login page', 'scope'],
      ['feat(my scope): add login page', 'scope'],
      ['feat:  add login page', 'subject'],
      ['feat(ui) add login page', 'structure'],
    ];

    for (const [raw, rule] of cases) {
      const result = validateCommitSubject(raw);
      expect(!result.ok && result.error.rule, raw).toBe(rule);
    }
  });

  it('rejects multi-line input', () => {
    const result = validateCommitSubject('feat: add login\n\nbody');
    expect(!result.ok && result.error.rule).toBe('single-line');
  });

  it('accepts a subject of exactly 72 characters', () => {
    const raw = `fix: ${'a'.repeat(67)}`;
    expect(raw).toHaveLength(72);
    expect(validateCommitSubject(raw).ok).toBe(true);
  });

  it('counts an emoji as one character', () => {
    const raw = `fix: ${'a'.repeat(60)}${'🚀'.repeat(7)}`;
    expect(raw).toHaveLength(79);
    expect(validateCommitSubject(raw).ok).toBe(true);

    const result = validateCommitSubject(`${raw}🚀`);
    expect(!result.ok && result.error.message).toBe(
      'Commit subject is 73 characters, limit is 72'
    );
  });

  it.each([73, 80, 120])(
    'fails with LineTooLong for a valid %i character subject',
    (length) => {
      const raw = `chore(deps): ${'x'.repeat(length - 'chore(deps): '.length)}`;
      expect(raw).toHaveLength(length);

      const result = validateCommitSubject(raw);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('LineTooLong');
        expect(result.error.rule).toBe('length');
        expect(result.error.message).toBe(
          `Commit subject is ${length} characters, limit is 72`
        );
      }
    }
  );

  it('reports grammar errors before length', () => {
    const result = validateCommitSubject(`feat: ${'x'.repeat(80)}.`);
    expect(!result.ok && result.error.code).toBe('InvalidFormat');
  });
});

describe('validateCommitMessage', () => {
  it('splits subject and body and collects tickets', () => {
    const result = validateCommitMessage(
      'fix(auth): refresh expired tokens\r\n\r\nRetries once on 401.\r\n\r\nRefs: titan-12, OPS-3, TITAN-12\r\n'
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.subject.subject).toBe('refresh expired tokens');
      expect(result.value.body).toBe('Retries once on 401.\n\nRefs: titan-12, OPS-3, TITAN-12');
      expect(result.value.tickets.map((t) => t.key)).toEqual(['TITAN-12', 'OPS-3']);
    }
  });

  it('allows a subject without a body', () => {
    const result = validateCommitMessage('docs: describe config file\n');
    expect(result.ok && result.value.body).toBe(null);
  });

  it('requires a blank line before the body', () => {
    const result = validateCommitMessage('docs: describe config file\nmore text');
    expect(!result.ok && result.error.rule).toBe('body-separator');
  });

  it('surfaces subject errors unchanged', () => {
    const result = validateCommitMessage('docs: describe config file.\n\nbody');
    expect(!result.ok && result.error.rule).toBe('trailing-period');
  });

  it('filters tickets by project key', () => {
    const result = validateCommitMessage('feat: add export\n\nTITAN-1 and OPS-2', {
      projectKeys: ['ops'],
    });
    expect(result.ok && result.value.tickets.map((t) => t.key)).toEqual(['OPS-2']);
  });
});

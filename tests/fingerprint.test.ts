import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';

import { computeFingerprint, isFingerprint, normalizeContent } from '../src/embeddings/fingerprint.js';

const identity = { provider: 'ollama', model: 'nomic-embed-text', configVersion: '1' };

describe('normalizeContent', () => {
  it('converts CRLF and lone CR to LF', () => {
    expect(normalizeContent('a\r\nb\rc')).toBe('a\nb\nc');
  });

  it('strips trailing whitespace per line and surrounding blank lines', () => {
    expect(normalizeContent('\n\n  const x = 1;  \t\nreturn x;   \n\n')).toBe('  const x = 1;\nreturn x;');
  });

  it('keeps interior blank lines', () => {
    expect(normalizeContent('a\n\n\nb')).toBe('a\n\n\nb');
  });
});

describe('computeFingerprint', () => {
  it('is a 64-character hex digest', () => {
    const fingerprint = computeFingerprint('def main(): pass', identity);
    expect(fingerprint).toMatch(/^[0-9a-f]{64}$/);
    expect(isFingerprint(fingerprint)).toBe(true);
  });

  it('hashes length-prefixed identity fields followed by the normalized content', () => {
    const expected = createHash('sha256')
      .update('6:ollama16:nomic-embed-text1:11:x')
      .digest('hex');
    expect(computeFingerprint('x  \r\n', identity)).toBe(expected);
  });

  it('ignores whitespace-only differences', () => {
    const a = computeFingerprint('line one\nline two', identity);
    const b = computeFingerprint('\r\nline one   \r\nline two\r\n\r\n', identity);
    expect(a).toBe(b);
  });

  it('changes with the content', () => {
    expect(computeFingerprint('a', identity)).not.toBe(computeFingerprint('b', identity));
  });

  it('changes with the backend identity', () => {
    const base = computeFingerprint('same text', identity);
    expect(computeFingerprint('same text', { ...identity, provider: 'openai' })).not.toBe(base);
    expect(computeFingerprint('same text', { ...identity, model: 'other-model' })).not.toBe(base);
    expect(computeFingerprint('same text', { ...identity, configVersion: '2' })).not.toBe(base);
  });

  it('does not collide when field boundaries shift', () => {
    const a = computeFingerprint('c', { provider: 'ab', model: 'c', configVersion: '1' });
    const b = computeFingerprint('c', { provider: 'a', model: 'bc', configVersion: '1' });
    expect(a).not.toBe(b);
  });
});

describe('isFingerprint', () => {
  it('rejects anything other than 64 lowercase hex characters', () => {
    expect(isFingerprint('abc')).toBe(false);
    expect(isFingerprint('A'.repeat(64))).toBe(false);
    expect(isFingerprint('../' + 'a'.repeat(61))).toBe(false);
    expect(isFingerprint('0'.repeat(64))).toBe(true);
  });
});

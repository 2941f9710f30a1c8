import { createHash } from 'crypto';

/**
 * What produced a vector. Two backends with different identities never share cache entries.
 */
export interface BackendIdentity {
  provider: string;
  model: string;
  configVersion: string;
}

const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Line endings to LF, trailing whitespace stripped per line,
 * leading and trailing blank lines removed.
 */
export function normalizeContent(content: string): string {
  const lines = content
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/\s+$/, ''));

  let start = 0;
  let end = lines.length;
  while (start < end && lines[start] === '') start++;
  while (end > start && lines[end - 1] === '') end--;
  return lines.slice(start, end).join('\n');
}

export function computeFingerprint(content: string, identity: BackendIdentity): string {
  const hash = createHash('sha256');
  // Length-prefixed fields so no two (identity, content) pairs collide by concatenation
  for (const field of [identity.provider, identity.model, identity.configVersion, normalizeContent(content)]) {
    hash.update(`${Buffer.byteLength(field, 'utf8')}:`);
    hash.update(field, 'utf8');
  }
  return hash.digest('hex');
}

export function isFingerprint(value: string): boolean {
  return FINGERPRINT_PATTERN.test(value);
}

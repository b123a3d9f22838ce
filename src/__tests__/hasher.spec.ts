/**
 * Hasher tests
 */

import { digestsMatch, sha256 } from '../crypto/index.js';

describe('digestsMatch', () => {
  const digest = sha256('hello');

  it('accepts identical digests', () => {
    expect(digestsMatch(digest, sha256('hello'))).toBe(true);
  });

  it('rejects digests of different content', () => {
    expect(digestsMatch(digest, sha256('hellp'))).toBe(false);
  });

  it('rejects a digest of a different length without throwing', () => {
    expect(digestsMatch(digest, digest.slice(0, 10))).toBe(false);
    expect(digestsMatch(digest, '')).toBe(false);
  });
});

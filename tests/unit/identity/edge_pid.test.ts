import { createHash } from 'node:crypto';
import { describe, it, expect } from 'vitest';

import {
  ANONYMOUS_PREFIX,
  canonicalEdgeKey,
  computeEdgePid,
  generateAnonymousPid,
} from '@/identity/edgePid.js';

function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

describe('edge identity', () => {
  it('serializes subject, predicate, objects and named graph as one JSON array', () => {
    expect(canonicalEdgeKey('a', 'knows', ['b'])).toBe('["a","knows",["b"],null]');
    expect(canonicalEdgeKey('a', 'knows', ['b', 'c'], 'g1')).toBe('["a","knows",["b","c"],"g1"]');
  });

  it('hashes the canonical key with sha256', () => {
    expect(computeEdgePid('a', 'knows', ['b'])).toBe(
      `anon_${sha256('["a","knows",["b"],null]')}`,
    );
    expect(computeEdgePid('a', 'knows', ['b'])).toMatch(/^anon_[0-9a-f]{64}$/);
  });

  it('is deterministic and sensitive to every component', () => {
    const base = computeEdgePid('a', 'knows', ['b', 'c']);
    expect(computeEdgePid('a', 'knows', ['b', 'c'])).toBe(base);
    expect(computeEdgePid('a', 'knows', ['c', 'b'])).not.toBe(base);
    expect(computeEdgePid('a', 'likes', ['b', 'c'])).not.toBe(base);
    expect(computeEdgePid('a', 'knows', ['b', 'c'], 'g1')).not.toBe(base);
    expect(computeEdgePid('a', 'knows', ['b', 'c'], null)).toBe(base);
  });

  it('generates random anonymous node pids', () => {
    const first = generateAnonymousPid();
    expect(first.startsWith(ANONYMOUS_PREFIX)).toBe(true);
    expect(first).toMatch(/^anon_[0-9a-f]{32}$/);
    expect(generateAnonymousPid()).not.toBe(first);
  });
});

/**
 * Content-derived edge identity.
 *
 * The pid of an edge is a pure function of its triple and named graph:
 *
 *   "anon_" + hex(sha256(utf8(JSON.stringify([s, p, [o...], n ?? null]))))
 *
 * `s` and `o` are pids (never row ids) so identifiers agree across stores.
 * Object order is kept as given.
 */

import { createHash, randomUUID } from 'node:crypto';

export const ANONYMOUS_PREFIX = 'anon_';

export function canonicalEdgeKey(
  subjectPid: string,
  predicate: string,
  objectPids: readonly string[],
  namedGraph?: string | null,
): string {
  return JSON.stringify([subjectPid, predicate, [...objectPids], namedGraph ?? null]);
}

export function computeEdgePid(
  subjectPid: string,
  predicate: string,
  objectPids: readonly string[],
  namedGraph?: string | null,
): string {
  const hash = createHash('sha256')
    .update(canonicalEdgeKey(subjectPid, predicate, objectPids, namedGraph), 'utf8')
    .digest('hex');
  return `${ANONYMOUS_PREFIX}${hash}`;
}

/** Pid for a node input that carries none. */
export function generateAnonymousPid(): string {
  return `${ANONYMOUS_PREFIX}${randomUUID().replace(/-/g, '')}`;
}

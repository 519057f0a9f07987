/**
 * IdentityTranslator - bidirectional pid ↔ row id mapping over the shared relation.
 *
 * The relation is the source of truth; both directions are memoized in LRU
 * caches. Row ids are immutable and pids are never reassigned, so a cached
 * entry only goes stale when a write transaction rolls back, which must call
 * `clear()`.
 */

import { LRUCache } from 'lru-cache';

import type { NodeRelation, RowIdentity } from './relation.js';

export class IdentityTranslator {
  private readonly pidCache: LRUCache<string, number>;
  private readonly rowIdCache: LRUCache<number, string>;
  private readonly otypeCache: LRUCache<number, string>;

  constructor(
    private readonly relation: NodeRelation,
    cacheSize = 10000,
  ) {
    this.pidCache = new LRUCache<string, number>({ max: cacheSize });
    this.rowIdCache = new LRUCache<number, string>({ max: cacheSize });
    this.otypeCache = new LRUCache<number, string>({ max: cacheSize });
  }

  /** Number of rows, and so of pid ↔ row id pairs. */
  get size(): number {
    return this.relation.count();
  }

  pidToRowId(pid: string): number | undefined {
    const cached = this.pidCache.get(pid);
    if (cached !== undefined) return cached;
    const identity = this.relation.identityOfPid(pid);
    if (!identity) return undefined;
    this.remember(identity);
    return identity.row_id;
  }

  rowIdToPid(rowId: number): string | undefined {
    const cached = this.rowIdCache.get(rowId);
    if (cached !== undefined) return cached;
    const identity = this.relation.identityOfRowId(rowId);
    if (!identity) return undefined;
    this.remember(identity);
    return identity.pid;
  }

  /** otype of the row a pid names. */
  otypeOf(pid: string): string | undefined {
    const rowId = this.pidToRowId(pid);
    if (rowId === undefined) return undefined;
    const cached = this.otypeCache.get(rowId);
    if (cached !== undefined) return cached;
    const identity = this.relation.identityOfRowId(rowId);
    if (!identity) return undefined;
    this.remember(identity);
    return identity.otype;
  }

  /**
   * Resolve many pids at once. Pids that do not resolve are listed in `missing`.
   */
  resolveAll(pids: readonly string[]): { rowIds: number[]; missing: string[] } {
    const rowIds: number[] = [];
    const missing: string[] = [];
    for (const pid of pids) {
      const rowId = this.pidToRowId(pid);
      if (rowId === undefined) {
        if (!missing.includes(pid)) missing.push(pid);
      } else {
        rowIds.push(rowId);
      }
    }
    return { rowIds, missing };
  }

  /** Record a pair known from a write or a join. */
  remember(identity: RowIdentity): void {
    this.pidCache.set(identity.pid, identity.row_id);
    this.rowIdCache.set(identity.row_id, identity.pid);
    this.otypeCache.set(identity.row_id, identity.otype);
  }

  clear(): void {
    this.pidCache.clear();
    this.rowIdCache.clear();
    this.otypeCache.clear();
  }
}

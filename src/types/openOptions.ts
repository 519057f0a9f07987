/**
 * FlatGraph open options
 *
 * These options control caching, paging, decomposition limits and traversal
 * safety rails of one graph handle.
 */
export interface FlatGraphOpenOptions {
  /**
   * Take a process-level exclusive write lock (`<path>.lock`).
   *
   * A second writer opening the same file fails until the lock is released.
   * Ignored for in-memory stores.
   *
   * @default false
   */
  enableLock?: boolean;

  /**
   * Open an existing store file without write access.
   *
   * Writes and `initialize()` on an uninitialized store fail with
   * `ConfigError`; no lock is taken and the journal mode is left alone.
   *
   * @default false
   */
  readonly?: boolean;

  /**
   * Entries kept in each direction of the pid ↔ row id cache.
   *
   * @default 10000
   * @minimum 1
   */
  identityCacheSize?: number;

  /**
   * Rows fetched per engine query when a result sequence is iterated.
   *
   * @default 1000
   * @minimum 1
   * @maximum 100000
   */
  pageSize?: number;

  /**
   * Deepest nesting `addNode` accepts before giving up with `StructuralError`.
   * Unbounded when absent.
   *
   * @minimum 1
   */
  maxDecompositionDepth?: number;

  /**
   * Emit debug logs. `FLATGRAPH_DEBUG=1` turns them on globally.
   *
   * @default false
   */
  debug?: boolean;

  traversal?: {
    /** Default hop limit of breadth-first traversals (unbounded when absent) */
    maxDepth?: number;
    /**
     * Number of yielded steps after which a traversal logs a warning.
     * `FLATGRAPH_TRAVERSAL_WARN_THRESHOLD` overrides the default; 0 disables it.
     *
     * @default 10000
     */
    warnThreshold?: number;
  };

  /** Clock used for `tcreated`/`tmodified`, in epoch milliseconds. */
  now?: () => number;
}

/**
 * Check that an input satisfies the basic FlatGraph open option constraints
 */
export function isFlatGraphOpenOptions(value: unknown): value is FlatGraphOpenOptions {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }

  const options: Record<string, unknown> = { ...value };

  const ensureOptionalBoolean = (key: keyof FlatGraphOpenOptions): boolean => {
    if (!(key in options)) return true;
    return typeof options[key] === 'boolean';
  };

  const isNumberWithin = (
    candidate: unknown,
    { min, max, integer }: { min?: number; max?: number; integer?: boolean } = {},
  ): boolean => {
    if (typeof candidate !== 'number' || !Number.isFinite(candidate)) return false;
    if (integer && !Number.isInteger(candidate)) return false;
    if (min !== undefined && candidate < min) return false;
    if (max !== undefined && candidate > max) return false;
    return true;
  };

  const ensureOptionalNumber = (
    key: keyof FlatGraphOpenOptions,
    bounds: { min?: number; max?: number; integer?: boolean },
  ): boolean => !(key in options) || isNumberWithin(options[key], bounds);

  if (!ensureOptionalBoolean('enableLock')) return false;
  if (!ensureOptionalBoolean('debug')) return false;
  if (!ensureOptionalBoolean('readonly')) return false;
  if (!ensureOptionalNumber('identityCacheSize', { min: 1, integer: true })) return false;
  if (!ensureOptionalNumber('pageSize', { min: 1, max: 100000, integer: true })) return false;
  if (!ensureOptionalNumber('maxDecompositionDepth', { min: 1, integer: true })) return false;

  if ('now' in options && typeof options.now !== 'function') {
    return false;
  }

  if ('traversal' in options) {
    const traversal = options.traversal;
    if (traversal !== undefined) {
      if (traversal === null || typeof traversal !== 'object') {
        return false;
      }
      const traversalRecord: Record<string, unknown> = { ...traversal };
      if (
        'maxDepth' in traversalRecord &&
        !isNumberWithin(traversalRecord.maxDepth, { min: 1, integer: true })
      ) {
        return false;
      }
      if (
        'warnThreshold' in traversalRecord &&
        !isNumberWithin(traversalRecord.warnThreshold, { min: 0, integer: true })
      ) {
        return false;
      }
    }
  }

  return true;
}

/**
 * Assert that an input satisfies the FlatGraph open option requirements
 */
export function assertFlatGraphOpenOptions(
  value: unknown,
  message?: string,
): asserts value is FlatGraphOpenOptions {
  if (!isFlatGraphOpenOptions(value)) {
    throw new TypeError(message ?? 'Invalid FlatGraph open options');
  }
}

/**
 * In-process argument memoization.
 *
 * `memoize(fn, { cache, name })` returns a function with the same signature
 * as `fn` that looks its arguments up in a table owned by `cache` before
 * delegating. Only pure functions may be wrapped: results live as long as
 * the cache and are never evicted.
 *
 * Argument keys:
 *   - strings, numbers, booleans, bigints, null, undefined: by type and value
 *   - arrays: element-wise, recursively (a snapshot of the contents)
 *   - other objects and functions: by identity
 *   - symbols: rejected
 */

export class UnhashableArgumentError extends Error {
  constructor(name: string, position: number) {
    super(`Argument ${position} of memoized function "${name}" cannot be used as a cache key`);
    this.name = "UnhashableArgumentError";
  }
}

export interface MemoTableStats {
  readonly name: string;
  readonly size: number;
  readonly hits: number;
  readonly misses: number;
}

interface ClearableTable {
  stats(): MemoTableStats;
  clear(): void;
}

/**
 * Result table for one memoized function.
 */
export class MemoTable<R> implements ClearableTable {
  private readonly entries = new Map<string, { readonly value: R }>();
  private hits = 0;
  private misses = 0;

  constructor(public readonly name: string) {}

  /** Stored result for `key`, or the computed one after storing it. */
  getOrCompute(key: string, compute: () => R): R {
    const entry = this.entries.get(key);
    if (entry) {
      this.hits++;
      return entry.value;
    }
    this.misses++;
    const value = compute();
    this.entries.set(key, { value });
    return value;
  }

  stats(): MemoTableStats {
    return { name: this.name, size: this.entries.size, hits: this.hits, misses: this.misses };
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }
}

/**
 * Process-lifetime memoization cache.
 *
 * Created empty, populated lazily by the functions memoized against it,
 * never torn down. Holds one named table per memoized function.
 */
export class MemoCache {
  private readonly tables = new Map<string, ClearableTable>();
  private readonly identities = new WeakMap<object, number>();
  private nextIdentity = 1;

  /**
   * Create the result table for a memoized function.
   * @throws Error if a table with this name already exists
   */
  createTable<R>(name: string): MemoTable<R> {
    if (this.tables.has(name)) {
      throw new Error(`Memo table "${name}" already exists in this cache`);
    }
    const table = new MemoTable<R>(name);
    this.tables.set(name, table);
    return table;
  }

  /** Stable per-cache identity for an object argument. */
  identityOf(value: object): number {
    let id = this.identities.get(value);
    if (id === undefined) {
      id = this.nextIdentity++;
      this.identities.set(value, id);
    }
    return id;
  }

  /** Drop every stored result. Tables stay registered. */
  clear(): void {
    for (const table of this.tables.values()) {
      table.clear();
    }
  }

  stats(): MemoTableStats[] {
    return [...this.tables.values()].map((table) => table.stats());
  }
}

function keyPart(value: unknown, cache: MemoCache, name: string, position: number): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => keyPart(item, cache, name, position)).join(",")}]`;
  }
  if (typeof value === "object" || typeof value === "function") {
    return `#${cache.identityOf(value)}`;
  }
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (typeof value === "number") {
    return Object.is(value, -0) ? "n:-0" : `n:${value}`;
  }
  if (typeof value === "symbol") {
    throw new UnhashableArgumentError(name, position);
  }
  // boolean, bigint, undefined
  return `${typeof value}:${String(value)}`;
}

/**
 * Cache key for an argument list.
 */
export function argumentKey(args: readonly unknown[], cache: MemoCache, name = "anonymous"): string {
  return args.map((arg, position) => keyPart(arg, cache, name, position)).join("|");
}

export interface MemoizeOptions<A extends readonly unknown[]> {
  /** Cache that owns the result table */
  cache: MemoCache;
  /** Table name, unique within the cache; defaults to the function's name */
  name?: string;
  /**
   * Map the arguments to the values the key is built from. Used when an
   * argument is a record that should be compared by contents.
   */
  normalize?: (...args: A) => readonly unknown[];
}

/**
 * Wrap a pure function with argument memoization.
 *
 * A call that throws stores nothing, so the next call with the same
 * arguments runs `fn` again.
 */
export function memoize<A extends readonly unknown[], R>(
  fn: (...args: A) => R,
  options: MemoizeOptions<A>
): (...args: A) => R {
  const { cache, normalize } = options;
  const name = options.name ?? (fn.name || "anonymous");
  const table = cache.createTable<R>(name);

  return (...args: A): R => {
    const key = argumentKey(normalize ? normalize(...args) : args, cache, name);
    return table.getOrCompute(key, () => fn(...args));
  };
}

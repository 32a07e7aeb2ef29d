/**
 * Two-level memoization: in-process argument memoization stacked over
 * persistent named caching.
 *
 *   const corpus = memoize(
 *     persistentCache("fcc", buildCorpus, { store, schema: DatasetSchema }),
 *     { cache, name: "corpus" }
 *   );
 *
 * Within one process the store is read at most once; across restarts the
 * store saves the build.
 */

export {
  memoize,
  argumentKey,
  MemoCache,
  MemoTable,
  UnhashableArgumentError,
  type MemoizeOptions,
  type MemoTableStats,
} from "./memoize.js";
export {
  persistentCache,
  PersistentStore,
  CacheCorruptionError,
  CACHE_FORMAT_VERSION,
  type CacheEnvelope,
  type PersistentCacheOptions,
} from "./persistent.js";

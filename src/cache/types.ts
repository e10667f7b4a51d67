/**
 * Index of a node in the recency arena.
 *
 * Handles are plain numbers: copyable, never owning. A handle is only
 * meaningful while its node is live; once released the index may be
 * handed out again.
 */
export type Handle = number;

export const NO_HANDLE: Handle = -1;

/**
 * Computes the weight of a value when `put` is called without one.
 */
export type Weigher<V> = (value: V) => number;

export interface CacheOptions<V> {
  /**
   * Weight used for `put(key, value)` without an explicit weight.
   *
   * Defaults to the byte length of the value's MessagePack encoding.
   */
  weigher?: Weigher<V>;
  /**
   * Log evictions and rejected puts to the console,
   * and verify every invariant after each mutation
   */
  debug?: boolean;
}

export type PutErrorCode = "InvalidWeight" | "WeightExceedsCapacity";

export type PutError = {
  code: PutErrorCode;
  message: string;
  weight: number;
  capacity: number;
};

export type PutResult<K> =
  | { ok: true; evicted: K[] }
  | { ok: false; error: PutError };

export type Evicted<K> = {
  key: K;
  weight: number;
};

export type CacheEvents<K> = {
  put: { key: K; weight: number };
  evict: Evicted<K>;
  remove: { key: K; weight: number };
  clear: { count: number };
};

export type CacheEventName = keyof CacheEvents<unknown>;

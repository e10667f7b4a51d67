import { CapacityAccountant } from "./accountant.js";
import { InvalidCapacityError, InvariantViolationError } from "./errors.js";
import { EvictionEngine } from "./eviction.js";
import { RecencyList } from "./recency.js";
import { EntryStore } from "./store.js";
import { encodedSize, isValidWeight } from "./weigher.js";

import type {
  CacheEventName,
  CacheEvents,
  CacheOptions,
  Evicted,
  PutError,
  PutErrorCode,
  PutResult,
  Weigher,
} from "./types.js";

class CacheEvent<T> extends Event {
  constructor(type: string, readonly detail: T) {
    super(type);
  }
}

// Map key equality
function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || Object.is(a, b);
}

/**
 * Bounded key-value cache where capacity is the sum of entry weights.
 *
 * Eviction drops least recently used entries, the fewest needed to fit
 * an incoming one. `get` counts as a use.
 *
 * Every operation is synchronous, so calls are serialized by the event loop.
 *
 * ```ts
 * const cache = new WeightedLRU<string, Uint8Array>(1024);
 * cache.put("avatar", bytes, bytes.byteLength);
 * cache.get("avatar");
 * ```
 */
export default class WeightedLRU<K, V> {
  private readonly store = new EntryStore<K>();
  private readonly order = new RecencyList<K, V>();
  private readonly accountant: CapacityAccountant;
  private readonly eviction: EvictionEngine<K, V>;
  private readonly events = new EventTarget();
  private readonly weigher: Weigher<V>;
  private readonly debug: boolean;

  constructor(capacity: number, options: CacheOptions<V> = {}) {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new InvalidCapacityError(capacity);
    }

    this.accountant = new CapacityAccountant(capacity);
    this.eviction = new EvictionEngine(this.store, this.order, this.accountant);
    this.weigher = options.weigher ?? encodedSize;
    this.debug = options.debug ?? false;
  }

  get capacity(): number {
    return this.accountant.capacity;
  }

  /**
   * Read a value and mark it most recently used.
   * `undefined` when the key is absent.
   */
  get(key: K): V | undefined {
    const handle = this.store.lookup(key);
    if (handle === undefined) return undefined;

    this.order.promote(handle);
    return this.order.valueOf(handle);
  }

  /**
   * Read a value without touching its recency
   */
  peek(key: K): V | undefined {
    const handle = this.store.lookup(key);
    if (handle === undefined) return undefined;

    return this.order.valueOf(handle);
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  /**
   * Store a value as most recently used, evicting least recently used
   * entries until it fits.
   *
   * Without `weight` the configured weigher is used.
   * A rejected put changes nothing, an existing entry for `key` included.
   */
  put(key: K, value: V, weight: number = this.weigher(value)): PutResult<K> {
    if (!isValidWeight(weight)) {
      return this.reject(
        "InvalidWeight",
        weight,
        `weight must be a positive integer, got ${weight}`
      );
    }

    if (weight > this.capacity) {
      return this.reject(
        "WeightExceedsCapacity",
        weight,
        `weight ${weight} exceeds capacity ${this.capacity}`
      );
    }

    // replacement: drop the old entry before making room
    const existing = this.store.remove(key);
    if (existing !== undefined) {
      this.order.remove(existing);
      this.accountant.release(this.order.weightOf(existing));
      this.order.release(existing);
    }

    const room = this.eviction.makeRoom(weight);
    if (!room.ok) {
      // unreachable once weight <= capacity
      this.afterMutation();
      this.emitEvictions(room.evicted);
      return this.reject(
        "WeightExceedsCapacity",
        weight,
        `no room for weight ${weight} within capacity ${this.capacity}`
      );
    }

    const handle = this.order.pushMostRecent(key, value, weight);
    this.store.insert(key, handle);
    this.accountant.admit(weight);

    this.afterMutation();
    this.emitEvictions(room.evicted);
    this.emit("put", { key, weight });

    return { ok: true, evicted: room.evicted.map((e) => e.key) };
  }

  /**
   * @returns whether the key was present
   */
  remove(key: K): boolean {
    const handle = this.store.remove(key);
    if (handle === undefined) return false;

    const weight = this.order.weightOf(handle);
    this.order.remove(handle);
    this.accountant.release(weight);
    this.order.release(handle);

    this.afterMutation();
    this.emit("remove", { key, weight });
    return true;
  }

  /**
   * total weight of the stored entries
   */
  size(): number {
    return this.accountant.current;
  }

  /**
   * number of stored entries
   */
  len(): number {
    return this.store.size;
  }

  available(): number {
    return this.capacity - this.accountant.current;
  }

  /**
   * Keys from most to least recently used. Does not reorder.
   */
  keys(): K[] {
    const keys: K[] = [];
    for (const handle of this.order.fromMostRecent()) {
      keys.push(this.order.keyOf(handle));
    }
    return keys;
  }

  /**
   * Entries from most to least recently used. Does not reorder.
   */
  entries(): [K, V][] {
    const entries: [K, V][] = [];
    for (const handle of this.order.fromMostRecent()) {
      entries.push([this.order.keyOf(handle), this.order.valueOf(handle)]);
    }
    return entries;
  }

  /**
   * Release every entry at once
   */
  clear(): void {
    const count = this.store.size;

    this.store.clear();
    this.order.clear();
    this.accountant.reset();

    this.emit("clear", { count });
  }

  /**
   * Verify the internal structures agree with each other.
   * Throws `InvariantViolationError` on the first disagreement.
   */
  check(): void {
    if (!(this.capacity > 0)) {
      throw new InvariantViolationError(`capacity ${this.capacity} is not positive`);
    }

    if (this.order.length !== this.store.size) {
      throw new InvariantViolationError(
        `recency order holds ${this.order.length} entries, store holds ${this.store.size}`
      );
    }

    let total = 0;
    for (const handle of this.order.fromLeastRecent()) {
      const key = this.order.keyOf(handle);
      const weight = this.order.weightOf(handle);

      if (this.store.lookup(key) !== handle) {
        throw new InvariantViolationError(
          `key ${String(key)} is ordered but not indexed at handle ${handle}`
        );
      }
      if (!isValidWeight(weight)) {
        throw new InvariantViolationError(
          `key ${String(key)} has invalid weight ${weight}`
        );
      }
      total += weight;
    }

    for (const [key, handle] of this.store.entries()) {
      if (!this.order.isLive(handle) || !sameValueZero(this.order.keyOf(handle), key)) {
        throw new InvariantViolationError(
          `key ${String(key)} is indexed at a handle it does not own`
        );
      }
    }

    if (total !== this.accountant.current) {
      throw new InvariantViolationError(
        `accounted weight ${this.accountant.current} differs from stored weight ${total}`
      );
    }

    if (total > this.capacity) {
      throw new InvariantViolationError(
        `stored weight ${total} exceeds capacity ${this.capacity}`
      );
    }
  }

  /**
   * Subscribe to cache events.
   *
   * @param event -
   * - `put`    → `{ key, weight }`
   * - `evict`  → `{ key, weight }`, once per evicted entry, least recent first
   * - `remove` → `{ key, weight }`
   * - `clear`  → `{ count }`
   *
   * A listener that throws is logged and does not reach the caller
   * or the remaining listeners.
   *
   * @returns Cleanup function to unsubscribe.
   */
  subscribe<E extends CacheEventName>(
    event: E,
    listener: (data: CacheEvents<K>[E]) => void
  ): () => void {
    const wrapped = (e: Event) => {
      if (!(e instanceof CacheEvent)) return;
      try {
        listener(e.detail);
      } catch (err) {
        console.error(`[wlru]: "${event}" listener failed:`, err);
      }
    };

    this.events.addEventListener(event, wrapped);

    return () => {
      this.events.removeEventListener(event, wrapped);
    };
  }

  private emit<E extends CacheEventName>(event: E, data: CacheEvents<K>[E]): void {
    this.events.dispatchEvent(new CacheEvent(event, data));
  }

  private emitEvictions(evicted: Evicted<K>[]): void {
    for (const entry of evicted) {
      if (this.debug) {
        console.debug(
          `%c[wlru]: %cevicted ${String(entry.key)} (weight ${entry.weight})`,
          "color: lightgreen; font-weight: bold;",
          "font-style:italic;color:lightgrey"
        );
      }
      this.emit("evict", entry);
    }
  }

  private reject(code: PutErrorCode, weight: number, message: string): PutResult<K> {
    const error: PutError = { code, message, weight, capacity: this.capacity };

    if (this.debug) {
      console.debug(
        `%c[wlru]: %crejected put: ${message}`,
        "color: orange; font-weight: bold;",
        "font-style:italic;color:lightgrey"
      );
    }

    return { ok: false, error };
  }

  private afterMutation(): void {
    if (this.debug) this.check();
  }
}

import { DuplicateKeyError } from "./errors.js";
import type { Handle } from "./types.js";

/**
 * Key → handle index. No ordering of its own.
 */
export class EntryStore<K> {
  private readonly index = new Map<K, Handle>();

  get size(): number {
    return this.index.size;
  }

  /**
   * Callers must `remove` an existing key first.
   */
  insert(key: K, handle: Handle): void {
    if (this.index.has(key)) {
      throw new DuplicateKeyError(key);
    }
    this.index.set(key, handle);
  }

  lookup(key: K): Handle | undefined {
    return this.index.get(key);
  }

  remove(key: K): Handle | undefined {
    const handle = this.index.get(key);
    if (handle === undefined) return undefined;

    this.index.delete(key);
    return handle;
  }

  has(key: K): boolean {
    return this.index.has(key);
  }

  clear(): void {
    this.index.clear();
  }

  entries(): IterableIterator<[K, Handle]> {
    return this.index.entries();
  }
}

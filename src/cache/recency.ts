import { InvariantViolationError } from "./errors.js";
import { NO_HANDLE, type Handle } from "./types.js";

type Node<K, V> = {
  key: K;
  value: V;
  weight: number;
  prev: Handle;
  next: Handle;
  linked: boolean;
};

/**
 * Access order of the cached entries, least recent at the head.
 *
 * Nodes live in a growable arena and link to each other by index, so
 * removing a node from the middle is O(1) without any node holding a
 * reference to another. Slots freed by `release` go on a free list and
 * are reused by the next `pushMostRecent`.
 *
 * Unlinking (`popLeastRecent`, `remove`) and releasing are separate steps:
 * an unlinked node can still be read until it is released.
 */
export class RecencyList<K, V> {
  private nodes: (Node<K, V> | undefined)[] = [];
  private readonly free: Handle[] = [];
  private head: Handle = NO_HANDLE;
  private tail: Handle = NO_HANDLE;
  private count = 0;

  /**
   * number of linked nodes
   */
  get length(): number {
    return this.count;
  }

  pushMostRecent(key: K, value: V, weight: number): Handle {
    const handle =
      this.free.length > 0 ? this.popFree() : this.nodes.length;

    this.nodes[handle] = {
      key,
      value,
      weight,
      prev: NO_HANDLE,
      next: NO_HANDLE,
      linked: false,
    };
    this.link(handle);
    return handle;
  }

  /**
   * move to most-recently-used
   */
  promote(handle: Handle): void {
    if (handle !== NO_HANDLE && handle === this.tail) return;

    this.unlink(handle);
    this.link(handle);
  }

  /**
   * Unlink the least recently used node.
   * The node stays readable until `release`.
   */
  popLeastRecent(): Handle | undefined {
    if (this.head === NO_HANDLE) return undefined;

    const handle = this.head;
    this.unlink(handle);
    return handle;
  }

  remove(handle: Handle): void {
    this.unlink(handle);
  }

  /**
   * Free the slot, dropping its key and value.
   */
  release(handle: Handle): void {
    const node = this.node(handle);
    if (node.linked) {
      throw new InvariantViolationError(`handle ${handle} released while linked`);
    }

    this.nodes[handle] = undefined;
    this.free.push(handle);
  }

  keyOf(handle: Handle): K {
    return this.node(handle).key;
  }

  valueOf(handle: Handle): V {
    return this.node(handle).value;
  }

  weightOf(handle: Handle): number {
    return this.node(handle).weight;
  }

  isLive(handle: Handle): boolean {
    return this.nodes[handle] !== undefined;
  }

  /**
   * Drop every node at once.
   */
  clear(): void {
    this.nodes = [];
    this.free.length = 0;
    this.head = NO_HANDLE;
    this.tail = NO_HANDLE;
    this.count = 0;
  }

  /**
   * Handles from least to most recently used
   */
  *fromLeastRecent(): IterableIterator<Handle> {
    for (let h = this.head; h !== NO_HANDLE; h = this.node(h).next) {
      yield h;
    }
  }

  /**
   * Handles from most to least recently used
   */
  *fromMostRecent(): IterableIterator<Handle> {
    for (let h = this.tail; h !== NO_HANDLE; h = this.node(h).prev) {
      yield h;
    }
  }

  private node(handle: Handle): Node<K, V> {
    const node = this.nodes[handle];
    if (node === undefined) {
      throw new InvariantViolationError(`handle ${handle} is not live`);
    }
    return node;
  }

  private popFree(): Handle {
    const handle = this.free.pop();
    if (handle === undefined) {
      throw new InvariantViolationError("free list is empty");
    }
    return handle;
  }

  // append at the tail (most recent end)
  private link(handle: Handle): void {
    const node = this.node(handle);
    if (node.linked) {
      throw new InvariantViolationError(`handle ${handle} is already linked`);
    }
    node.prev = this.tail;
    node.next = NO_HANDLE;
    node.linked = true;

    if (this.tail === NO_HANDLE) {
      this.head = handle;
    } else {
      this.node(this.tail).next = handle;
    }
    this.tail = handle;
    this.count++;
  }

  private unlink(handle: Handle): void {
    const node = this.node(handle);
    if (!node.linked) {
      throw new InvariantViolationError(`handle ${handle} is not linked`);
    }

    if (node.prev === NO_HANDLE) {
      this.head = node.next;
    } else {
      this.node(node.prev).next = node.next;
    }

    if (node.next === NO_HANDLE) {
      this.tail = node.prev;
    } else {
      this.node(node.next).prev = node.prev;
    }

    node.prev = NO_HANDLE;
    node.next = NO_HANDLE;
    node.linked = false;
    this.count--;
  }
}

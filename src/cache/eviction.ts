import type { CapacityAccountant } from "./accountant.js";
import { InvariantViolationError } from "./errors.js";
import type { RecencyList } from "./recency.js";
import type { EntryStore } from "./store.js";
import type { Evicted } from "./types.js";

export type MakeRoomResult<K> =
  | { ok: true; evicted: Evicted<K>[] }
  | { ok: false; error: "InsufficientCapacity"; evicted: Evicted<K>[] };

/**
 * Frees capacity by dropping entries strictly in recency order.
 *
 * Only the shortest least-recent prefix that makes room is evicted:
 * the loop stops as soon as the incoming weight fits.
 */
export class EvictionEngine<K, V> {
  constructor(
    private readonly store: EntryStore<K>,
    private readonly order: RecencyList<K, V>,
    private readonly accountant: CapacityAccountant
  ) {}

  makeRoom(forWeight: number): MakeRoomResult<K> {
    const evicted: Evicted<K>[] = [];

    while (this.accountant.wouldExceed(forWeight)) {
      const handle = this.order.popLeastRecent();
      if (handle === undefined) {
        // drained: current is 0, so forWeight alone exceeds capacity
        return { ok: false, error: "InsufficientCapacity", evicted };
      }

      const key = this.order.keyOf(handle);
      const weight = this.order.weightOf(handle);

      if (this.store.remove(key) !== handle) {
        throw new InvariantViolationError(
          `recency order and entry store disagree on key ${String(key)}`
        );
      }
      this.accountant.release(weight);
      this.order.release(handle);

      evicted.push({ key, weight });
    }

    return { ok: true, evicted };
  }
}

import { InvariantViolationError } from "./errors.js";

/**
 * Running total of admitted weight against a fixed capacity.
 * Callers check `wouldExceed` before they `admit`.
 */
export class CapacityAccountant {
  private total = 0;

  constructor(readonly capacity: number) {}

  get current(): number {
    return this.total;
  }

  wouldExceed(weight: number): boolean {
    return this.total + weight > this.capacity;
  }

  admit(weight: number): void {
    this.total += weight;
    if (this.total > this.capacity) {
      throw new InvariantViolationError(
        `admitted weight ${this.total} exceeds capacity ${this.capacity}`
      );
    }
  }

  release(weight: number): void {
    this.total -= weight;
    if (this.total < 0) {
      throw new InvariantViolationError(
        `released more weight than admitted (total ${this.total})`
      );
    }
  }

  reset(): void {
    this.total = 0;
  }
}

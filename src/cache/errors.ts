export type CacheErrorCode =
  | "InvalidCapacity"
  | "DuplicateKey"
  | "InvariantViolation";

export class CacheError extends Error {
  constructor(readonly code: CacheErrorCode, message: string) {
    super(`[wlru]: ${message}`);
    this.name = new.target.name;
  }
}

export class InvalidCapacityError extends CacheError {
  constructor(readonly capacity: number) {
    super(
      "InvalidCapacity",
      `capacity must be a positive integer, got ${capacity}`
    );
  }
}

export class DuplicateKeyError extends CacheError {
  constructor(key: unknown) {
    super("DuplicateKey", `key ${String(key)} is already stored`);
  }
}

/**
 * Internal structures disagree with each other.
 * Never expected in correct operation; the cache should be discarded.
 */
export class InvariantViolationError extends CacheError {
  constructor(message: string) {
    super("InvariantViolation", message);
  }
}

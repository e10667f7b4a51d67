export { default as WeightedLRU } from "./cache/lru.js";
export {
  CacheError,
  DuplicateKeyError,
  InvalidCapacityError,
  InvariantViolationError,
} from "./cache/errors.js";
export type { CacheErrorCode } from "./cache/errors.js";
export { encodedSize, isValidWeight } from "./cache/weigher.js";
export type {
  CacheEventName,
  CacheEvents,
  CacheOptions,
  Evicted,
  PutError,
  PutErrorCode,
  PutResult,
  Weigher,
} from "./cache/types.js";

import { encode } from "@msgpack/msgpack";

/**
 * Weight of a value as the byte length of its MessagePack encoding, at least 1.
 *
 * Throws whatever the encoder throws for values it cannot represent.
 */
export function encodedSize(value: unknown): number {
  return Math.max(1, encode(value).byteLength);
}

/**
 * Weight is a positive safe integer
 */
export function isValidWeight(weight: number): boolean {
  return Number.isSafeInteger(weight) && weight > 0;
}

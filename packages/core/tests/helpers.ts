/**
 * Shared fixtures for core unit tests.
 */

import nacl from "tweetnacl";
import { encodeBase58 } from "../src/codec.js";
import type { Keypair, RandomSource } from "../src/types.js";

/** Keypair derived from a seed filled with `fill`. */
export function fixedKeypair(fill: number): Keypair {
  const { publicKey, secretKey } = nacl.sign.keyPair.fromSeed(new Uint8Array(32).fill(fill));
  return { publicKey, secretKey };
}

/** Base58 address derived from a seed filled with `fill`. */
export function fixedAddress(fill: number): string {
  return encodeBase58(fixedKeypair(fill).publicKey);
}

/** Random source that always returns bytes filled with `fill`. */
export function constantSource(fill: number): RandomSource {
  return (length) => new Uint8Array(length).fill(fill);
}

/** Run `fn` and return what it throws. Fails the test if it returns. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}

/** Little-endian u64 bytes. */
export function u64le(value: bigint): number[] {
  const bytes = new Uint8Array(8);
  new DataView(bytes.buffer).setBigUint64(0, value, true);
  return Array.from(bytes);
}

/**
 * Ed25519 key generation and secret parsing.
 *
 * Secrets use the Solana CLI convention: 64 bytes of seed ‖ public key,
 * base58-encoded. Randomness is injected so tests can pin it down.
 */

import nacl from "tweetnacl";
import { decodeBase58Exact, encodeBase58 } from "./codec.js";
import { ErrorCode, LedgerToolsError } from "./errors.js";
import {
  type EncodedKeypair,
  type Keypair,
  PUBLIC_KEY_LENGTH,
  type RandomSource,
  SECRET_KEY_LENGTH,
  SEED_LENGTH,
} from "./types.js";

export const defaultRandomSource: RandomSource = (length) => nacl.randomBytes(length);

export class KeyManager {
  private readonly random: RandomSource;

  constructor(random: RandomSource = defaultRandomSource) {
    this.random = random;
  }

  /**
   * Generate a fresh keypair from a 32-byte random seed.
   */
  generate(): Keypair {
    const seed = this.random(SEED_LENGTH);
    if (seed.length !== SEED_LENGTH) {
      throw new Error(`Random source returned ${seed.length} bytes, expected ${SEED_LENGTH}`);
    }
    const { publicKey, secretKey } = nacl.sign.keyPair.fromSeed(seed);
    return { publicKey, secretKey };
  }

  /**
   * Parse a base58-encoded 64-byte secret back into a keypair.
   *
   * The trailing 32 bytes must be the public key derived from the leading seed.
   */
  parseSecret(encoded: string): Keypair {
    const secretKey = decodeBase58Exact(encoded, SECRET_KEY_LENGTH, {
      field: "secret key",
      encodingCode: ErrorCode.InvalidSecretEncoding,
      lengthCode: ErrorCode.InvalidSecretLength,
    });

    const derived = nacl.sign.keyPair.fromSeed(secretKey.subarray(0, SEED_LENGTH));
    if (!nacl.verify(derived.publicKey, secretKey.subarray(SEED_LENGTH))) {
      throw new LedgerToolsError(
        ErrorCode.InvalidKeypair,
        "Invalid secret key: public key half does not match the seed",
        { field: "secret key" },
      );
    }

    return { publicKey: derived.publicKey, secretKey: derived.secretKey };
  }

  encodeKeypair(keypair: Keypair): EncodedKeypair {
    return {
      pubkey: encodeBase58(keypair.publicKey),
      secret: encodeBase58(keypair.secretKey),
    };
  }
}

/**
 * Parse a base58 Ed25519 public key.
 */
export function parsePublicKey(encoded: string, field = "public key"): Uint8Array {
  return decodeBase58Exact(encoded, PUBLIC_KEY_LENGTH, {
    field,
    lengthCode: ErrorCode.InvalidPublicKeyLength,
  });
}

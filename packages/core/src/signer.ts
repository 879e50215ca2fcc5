/**
 * Detached Ed25519 signing.
 */

import nacl from "tweetnacl";
import { encodeBase58, encodeBase64 } from "./codec.js";
import { KeyManager } from "./keys.js";
import type { Keypair, SignedMessage } from "./types.js";

const textEncoder = new TextEncoder();

/**
 * Sign a message with a parsed keypair.
 *
 * Ed25519 is deterministic: the same keypair and message always give the
 * same 64-byte signature.
 */
export function sign(message: Uint8Array, keypair: Keypair): Uint8Array {
  return nacl.sign.detached(message, keypair.secretKey);
}

/**
 * Sign a UTF-8 message with a base58-encoded 64-byte secret.
 *
 * @param message - Text to sign
 * @param secret - Base58 secret key (seed ‖ public key)
 * @param keys - Key manager used to parse the secret
 */
export function signMessage(message: string, secret: string, keys: KeyManager = new KeyManager()): SignedMessage {
  const keypair = keys.parseSecret(secret);
  const signature = sign(textEncoder.encode(message), keypair);

  return {
    signature: encodeBase64(signature),
    publicKey: encodeBase58(keypair.publicKey),
    message,
  };
}

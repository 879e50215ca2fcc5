/**
 * Detached Ed25519 signature verification.
 *
 * Malformed input (wrong key or signature length, bad encoding) is an
 * error. A well-formed signature that does not match is a plain `false`.
 */

import nacl from "tweetnacl";
import { decodeBase64 } from "./codec.js";
import { ErrorCode, LedgerToolsError } from "./errors.js";
import { parsePublicKey } from "./keys.js";
import { PUBLIC_KEY_LENGTH, SIGNATURE_LENGTH, type VerifiedMessage } from "./types.js";

const textEncoder = new TextEncoder();

/**
 * Verify a detached signature.
 *
 * The public key length is checked before the signature length.
 *
 * @throws LedgerToolsError(invalid_public_key_length | invalid_signature_length)
 */
export function verify(message: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): boolean {
  if (publicKey.length !== PUBLIC_KEY_LENGTH) {
    throw new LedgerToolsError(
      ErrorCode.InvalidPublicKeyLength,
      `Invalid public key: expected ${PUBLIC_KEY_LENGTH} bytes, got ${publicKey.length}`,
      { field: "public key" },
    );
  }
  if (signature.length !== SIGNATURE_LENGTH) {
    throw new LedgerToolsError(
      ErrorCode.InvalidSignatureLength,
      `Invalid signature: expected ${SIGNATURE_LENGTH} bytes, got ${signature.length}`,
      { field: "signature" },
    );
  }

  return nacl.sign.detached.verify(message, signature, publicKey);
}

/**
 * Verify a base64 signature over a UTF-8 message against a base58 public key.
 */
export function verifyMessage(message: string, signatureBase64: string, pubkey: string): VerifiedMessage {
  const publicKey = parsePublicKey(pubkey);

  let signature: Uint8Array;
  try {
    signature = decodeBase64(signatureBase64);
  } catch (error) {
    throw new LedgerToolsError(ErrorCode.InvalidEncoding, "Invalid signature: not a valid base64 string", {
      field: "signature",
      cause: error,
    });
  }

  const valid = verify(textEncoder.encode(message), signature, publicKey);
  return { valid, message, pubkey };
}

/**
 * Base58 / Base64 codecs shared by every core component.
 *
 * Uses bs58 for the Bitcoin alphabet and @solana/kit's string codecs for
 * base64. Decoders are strict: they never truncate, pad or skip input.
 */

import { getBase64Decoder, getBase64Encoder } from "@solana/kit";
import bs58 from "bs58";
import { ErrorCode, type ErrorCodeValue, LedgerToolsError } from "./errors.js";

// Padded, standard alphabet, length a multiple of 4
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// =============================================================================
// Base58
// =============================================================================

export function encodeBase58(bytes: Uint8Array): string {
  return bs58.encode(bytes);
}

/**
 * Decode a base58 string (Bitcoin alphabet).
 *
 * @throws LedgerToolsError(invalid_encoding) on characters outside the alphabet
 */
export function decodeBase58(text: string): Uint8Array {
  try {
    return bs58.decode(text);
  } catch (error) {
    throw new LedgerToolsError(ErrorCode.InvalidEncoding, "Invalid base58 string", { cause: error });
  }
}

export interface ExactDecodeOptions {
  /** Parameter name used in error messages */
  field: string;
  /** Code raised when the text is not base58 */
  encodingCode?: ErrorCodeValue;
  /** Code raised when the decoded length is wrong */
  lengthCode: ErrorCodeValue;
}

/**
 * Decode base58 and require an exact byte length.
 */
export function decodeBase58Exact(text: string, length: number, options: ExactDecodeOptions): Uint8Array {
  const { field, encodingCode = ErrorCode.InvalidEncoding, lengthCode } = options;

  let bytes: Uint8Array;
  try {
    bytes = bs58.decode(text);
  } catch (error) {
    throw new LedgerToolsError(encodingCode, `Invalid ${field}: not a valid base58 string`, {
      field,
      cause: error,
    });
  }

  if (bytes.length !== length) {
    throw new LedgerToolsError(lengthCode, `Invalid ${field}: expected ${length} bytes, got ${bytes.length}`, {
      field,
    });
  }
  return bytes;
}

// =============================================================================
// Base64
// =============================================================================

export function encodeBase64(bytes: Uint8Array): string {
  return getBase64Decoder().decode(bytes);
}

/**
 * Decode a standard, padded base64 string.
 *
 * Rejects bad characters, bad padding and non-canonical trailing bits:
 * re-encoding the result must give back the input.
 *
 * @throws LedgerToolsError(invalid_encoding)
 */
export function decodeBase64(text: string): Uint8Array {
  if (!BASE64_PATTERN.test(text)) {
    throw new LedgerToolsError(ErrorCode.InvalidEncoding, "Invalid base64 string");
  }

  const bytes = Uint8Array.from(getBase64Encoder().encode(text));
  if (encodeBase64(bytes) !== text) {
    throw new LedgerToolsError(ErrorCode.InvalidEncoding, "Invalid base64 string: non-canonical encoding");
  }
  return bytes;
}

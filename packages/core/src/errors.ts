/**
 * Error taxonomy for ledger-tools core operations.
 *
 * Every failure is scoped to the input that produced it and carries a
 * stable, snake_case code the HTTP layer can forward as-is.
 */

// =============================================================================
// Error Codes
// =============================================================================

export const ErrorCode = {
  InvalidEncoding: "invalid_encoding",
  InvalidSecretEncoding: "invalid_secret_encoding",
  InvalidSecretLength: "invalid_secret_length",
  InvalidKeypair: "invalid_keypair",
  InvalidPublicKeyLength: "invalid_public_key_length",
  InvalidSignatureLength: "invalid_signature_length",
  InvalidAddress: "invalid_address",
  InvalidAmount: "invalid_amount",
  InvalidDecimals: "invalid_decimals",
  InstructionConstructionFailed: "instruction_construction_failed",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// Error Class
// =============================================================================

export interface LedgerToolsErrorOptions {
  /** Name of the input parameter that failed validation */
  field?: string;
  cause?: unknown;
}

export class LedgerToolsError extends Error {
  readonly code: ErrorCodeValue;
  readonly field: string | undefined;

  constructor(code: ErrorCodeValue, message: string, options: LedgerToolsErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "LedgerToolsError";
    this.code = code;
    this.field = options.field;
  }
}

export function isLedgerToolsError(value: unknown): value is LedgerToolsError {
  return value instanceof LedgerToolsError;
}

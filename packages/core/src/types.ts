/**
 * Shared types for ledger-tools core.
 */

// =============================================================================
// Sizes
// =============================================================================

export const PUBLIC_KEY_LENGTH = 32;
export const SEED_LENGTH = 32;
/** Secret key material is seed ‖ public key */
export const SECRET_KEY_LENGTH = 64;
export const SIGNATURE_LENGTH = 64;
export const ADDRESS_LENGTH = 32;

export const MAX_U64 = 2n ** 64n - 1n;
export const MAX_DECIMALS = 255;

// =============================================================================
// Keys
// =============================================================================

/** Ed25519 keypair in raw byte form. */
export interface Keypair {
  readonly publicKey: Uint8Array;
  /** 64 bytes: 32-byte seed followed by the 32-byte public key */
  readonly secretKey: Uint8Array;
}

/** Keypair rendered for transport. Both fields are base58. */
export interface EncodedKeypair {
  pubkey: string;
  secret: string;
}

/** Source of cryptographically secure random bytes. */
export type RandomSource = (length: number) => Uint8Array;

// =============================================================================
// Messages
// =============================================================================

export interface SignedMessage {
  /** Base64-encoded 64-byte detached signature */
  signature: string;
  /** Base58 public key of the signer */
  publicKey: string;
  message: string;
}

export interface VerifiedMessage {
  valid: boolean;
  message: string;
  pubkey: string;
}

// =============================================================================
// Instructions
// =============================================================================

/** Account metadata in transport form. */
export interface AccountMetaRecord {
  pubkey: string;
  isSigner: boolean;
  isWritable: boolean;
}

/** Instruction rendered for transport. */
export interface InstructionRecord {
  programId: string;
  accounts: AccountMetaRecord[];
  /** Base64-encoded instruction data */
  instructionData: string;
}

/** Unsigned 64-bit amount. Numbers must be safe integers. */
export type Amount = number | bigint;

export interface InitializeMintParams {
  mint: string;
  mintAuthority: string;
  decimals: number;
  /** Token program id; defaults to the SPL Token program */
  tokenProgram?: string;
}

export interface MintToParams {
  mint: string;
  destination: string;
  authority: string;
  amount: Amount;
  tokenProgram?: string;
}

export interface TransferNativeParams {
  from: string;
  to: string;
  lamports: Amount;
}

export interface TransferTokenParams {
  destination: string;
  mint: string;
  /** Used as both the source account and the signing authority */
  owner: string;
  amount: Amount;
  tokenProgram?: string;
}

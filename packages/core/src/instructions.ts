/**
 * Instruction Builder
 *
 * Validates semantic parameters, delegates to the Codama-generated
 * SPL Token / System program clients, and renders the resulting
 * instruction into a transport-safe record.
 *
 * Uses @solana/kit primitives - no legacy web3.js dependency.
 *
 * @example
 * ```typescript
 * import { InstructionBuilder } from "@ledger-tools/core";
 *
 * const builder = new InstructionBuilder();
 * const record = builder.buildMintTo({
 *   mint: "...",
 *   destination: "...",
 *   authority: "...",
 *   amount: 1_000_000n,
 * });
 * // record.instructionData is base64, record.accounts keep program order
 * ```
 */

import {
  type Address,
  createNoopSigner,
  getAddressDecoder,
  type Instruction,
  isSignerRole,
  isWritableRole,
} from "@solana/kit";
import { getTransferSolInstruction } from "@solana-program/system";
import {
  getInitializeMintInstruction,
  getMintToInstruction,
  getTransferInstruction,
  TOKEN_PROGRAM_ADDRESS,
} from "@solana-program/token";
import { decodeBase58Exact, encodeBase64 } from "./codec.js";
import { ErrorCode, LedgerToolsError } from "./errors.js";
import {
  ADDRESS_LENGTH,
  type Amount,
  type InitializeMintParams,
  type InstructionRecord,
  MAX_DECIMALS,
  MAX_U64,
  type MintToParams,
  type TransferNativeParams,
  type TransferTokenParams,
} from "./types.js";

// =============================================================================
// Protocol Instruction Factory
// =============================================================================

/**
 * Narrow interface over the ledger-protocol instruction constructors.
 *
 * Implementations receive already-validated inputs and may throw when the
 * protocol rejects a combination of them.
 */
export interface InstructionFactory {
  initializeMint(input: {
    programAddress: Address;
    mint: Address;
    mintAuthority: Address;
    decimals: number;
  }): Instruction;
  mintTo(input: {
    programAddress: Address;
    mint: Address;
    destination: Address;
    authority: Address;
    amount: bigint;
  }): Instruction;
  transferSol(input: { source: Address; destination: Address; amount: bigint }): Instruction;
  transferToken(input: {
    programAddress: Address;
    source: Address;
    destination: Address;
    authority: Address;
    amount: bigint;
  }): Instruction;
}

/**
 * Default factory backed by @solana-program/token and @solana-program/system.
 *
 * Signer accounts are passed as noop signers so the generated clients mark
 * them with signer roles; nothing is ever signed here.
 */
export const splInstructionFactory: InstructionFactory = {
  initializeMint({ programAddress, mint, mintAuthority, decimals }) {
    return getInitializeMintInstruction({ mint, mintAuthority, decimals, freezeAuthority: null }, { programAddress });
  },

  mintTo({ programAddress, mint, destination, authority, amount }) {
    return getMintToInstruction(
      { mint, token: destination, mintAuthority: createNoopSigner(authority), amount },
      { programAddress },
    );
  },

  transferSol({ source, destination, amount }) {
    return getTransferSolInstruction({ source: createNoopSigner(source), destination, amount });
  },

  transferToken({ programAddress, source, destination, authority, amount }) {
    return getTransferInstruction(
      { source, destination, authority: createNoopSigner(authority), amount },
      { programAddress },
    );
  },
};

// =============================================================================
// Parameter Validation
// =============================================================================

/**
 * Parse a base58 address that must decode to exactly 32 bytes.
 *
 * @param value - Base58 text
 * @param field - Parameter name, reported in the error message
 */
export function parseAddress(value: string, field: string): Address {
  const bytes = decodeBase58Exact(value, ADDRESS_LENGTH, {
    field: `${field} address`,
    encodingCode: ErrorCode.InvalidAddress,
    lengthCode: ErrorCode.InvalidAddress,
  });
  return getAddressDecoder().decode(bytes);
}

export function parseAmount(value: Amount, field: string): bigint {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new LedgerToolsError(ErrorCode.InvalidAmount, `Invalid ${field}: must be an integer`, { field });
  }

  const amount = BigInt(value);
  if (amount < 0n || amount > MAX_U64) {
    throw new LedgerToolsError(ErrorCode.InvalidAmount, `Invalid ${field}: must be between 0 and ${MAX_U64}`, {
      field,
    });
  }
  return amount;
}

export function parseDecimals(value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > MAX_DECIMALS) {
    throw new LedgerToolsError(ErrorCode.InvalidDecimals, `Invalid decimals: must be an integer between 0 and ${MAX_DECIMALS}`, {
      field: "decimals",
    });
  }
  return value;
}

function parseTokenProgram(value: string | undefined): Address {
  return value === undefined ? TOKEN_PROGRAM_ADDRESS : parseAddress(value, "token program");
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * Render an instruction for transport.
 *
 * Account order is kept exactly as the protocol client returned it.
 */
export function toInstructionRecord(instruction: Instruction): InstructionRecord {
  const accounts = instruction.accounts ?? [];
  const data = instruction.data ?? new Uint8Array(0);

  return {
    programId: instruction.programAddress,
    accounts: accounts.map((meta) => ({
      pubkey: meta.address,
      isSigner: isSignerRole(meta.role),
      isWritable: isWritableRole(meta.role),
    })),
    instructionData: encodeBase64(Uint8Array.from(data)),
  };
}

// =============================================================================
// Builder
// =============================================================================

export class InstructionBuilder {
  private readonly factory: InstructionFactory;

  constructor(factory: InstructionFactory = splInstructionFactory) {
    this.factory = factory;
  }

  /**
   * Build an InitializeMint instruction with no freeze authority.
   *
   * Accounts: [mint (writable), rent sysvar]
   */
  buildInitializeMint(params: InitializeMintParams): InstructionRecord {
    const mint = parseAddress(params.mint, "mint");
    const mintAuthority = parseAddress(params.mintAuthority, "mint authority");
    const programAddress = parseTokenProgram(params.tokenProgram);
    const decimals = parseDecimals(params.decimals);

    return this.construct("initialize mint", () =>
      this.factory.initializeMint({ programAddress, mint, mintAuthority, decimals }),
    );
  }

  /**
   * Build a MintTo instruction. No multisig co-signers.
   *
   * Accounts: [mint (writable), destination (writable), authority (signer)]
   */
  buildMintTo(params: MintToParams): InstructionRecord {
    const mint = parseAddress(params.mint, "mint");
    const destination = parseAddress(params.destination, "destination");
    const authority = parseAddress(params.authority, "authority");
    const programAddress = parseTokenProgram(params.tokenProgram);
    const amount = parseAmount(params.amount, "amount");

    return this.construct("mint to", () =>
      this.factory.mintTo({ programAddress, mint, destination, authority, amount }),
    );
  }

  /**
   * Build a System program SOL transfer.
   *
   * Accounts: [from (signer, writable), to (writable)]
   */
  buildTransferNative(params: TransferNativeParams): InstructionRecord {
    const source = parseAddress(params.from, "from");
    const destination = parseAddress(params.to, "to");
    const amount = parseAmount(params.lamports, "lamports");

    return this.construct("transfer", () => this.factory.transferSol({ source, destination, amount }));
  }

  /**
   * Build an SPL Token transfer where the owner is both the source account
   * and the signing authority.
   *
   * Accounts: [owner (writable), destination (writable), owner (signer)]
   *
   * The mint is validated but the classic Transfer instruction does not
   * reference it.
   */
  buildTransferToken(params: TransferTokenParams): InstructionRecord {
    const destination = parseAddress(params.destination, "destination");
    parseAddress(params.mint, "mint");
    const owner = parseAddress(params.owner, "owner");
    const programAddress = parseTokenProgram(params.tokenProgram);
    const amount = parseAmount(params.amount, "amount");

    return this.construct("token transfer", () =>
      this.factory.transferToken({ programAddress, source: owner, destination, authority: owner, amount }),
    );
  }

  private construct(name: string, build: () => Instruction): InstructionRecord {
    let instruction: Instruction;
    try {
      instruction = build();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new LedgerToolsError(
        ErrorCode.InstructionConstructionFailed,
        `Failed to build ${name} instruction: ${reason}`,
        { cause: error },
      );
    }
    return toInstructionRecord(instruction);
  }
}

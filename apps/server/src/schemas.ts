/**
 * Request body schemas.
 *
 * These only check presence and JSON types. Lengths, encodings and
 * numeric ranges are validated by @ledger-tools/core so the error
 * messages stay the same for every caller.
 */

import * as z from "zod";

const requiredString = z.string().min(1);

/** Overrides the SPL Token program, e.g. with Token-2022 */
const tokenProgram = requiredString.optional();

/** u64 amounts arrive as JSON numbers or as decimal strings for values above 2^53 */
const amount = z.union([z.number(), z.string().regex(/^\d+$/).transform((value) => BigInt(value))]);

export const CreateTokenSchema = z.object({
  mintAuthority: requiredString,
  mint: requiredString,
  decimals: z.number(),
  tokenProgram,
});

export const MintTokenSchema = z.object({
  mint: requiredString,
  destination: requiredString,
  authority: requiredString,
  amount,
  tokenProgram,
});

// Messages may be empty; only keys and signatures are required to be non-empty.
export const SignMessageSchema = z.object({
  message: z.string(),
  secret: requiredString,
});

export const VerifyMessageSchema = z.object({
  message: z.string(),
  signature: requiredString,
  pubkey: requiredString,
});

export const SendSolSchema = z.object({
  from: requiredString,
  to: requiredString,
  lamports: amount,
});

export const SendTokenSchema = z.object({
  destination: requiredString,
  mint: requiredString,
  owner: requiredString,
  amount,
  tokenProgram,
});

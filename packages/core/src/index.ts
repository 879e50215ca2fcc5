/**
 * ledger-tools core
 *
 * Stateless Ed25519 key handling, detached signatures, and Solana
 * instruction construction:
 * - Codec: strict base58 / base64
 * - Keys: keypair generation and secret parsing
 * - Signer / Verifier: detached signatures
 * - Instructions: SPL Token and System program instructions in transport form
 *
 * @packageDocumentation
 */

export * from "./codec.js";
export * from "./errors.js";
export * from "./instructions.js";
export * from "./keys.js";
export * from "./signer.js";
export * from "./types.js";
export * from "./verifier.js";

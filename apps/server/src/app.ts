/**
 * ledger-tools HTTP API
 *
 * Stateless JSON endpoints for Ed25519 keys, detached signatures and
 * Solana instruction construction. Each handler decodes its body, calls
 * exactly one core operation and wraps the result in an envelope:
 *
 *   { success: true, data }   |   { success: false, error }
 */

import {
  InstructionBuilder,
  isLedgerToolsError,
  KeyManager,
  signMessage,
  verifyMessage,
} from "@ledger-tools/core";
import { type Context, Hono } from "hono";
import { logger as requestLogger } from "hono/logger";
import type * as z from "zod";
import { type Logger, NOOP_LOGGER } from "./logger.js";
import {
  CreateTokenSchema,
  MintTokenSchema,
  SendSolSchema,
  SendTokenSchema,
  SignMessageSchema,
  VerifyMessageSchema,
} from "./schemas.js";

// =============================================================================
// Types
// =============================================================================

export interface SuccessEnvelope<T> {
  success: true;
  data: T;
}

export interface ErrorEnvelope {
  success: false;
  error: string;
}

export interface AppOptions {
  logger?: Logger;
  keys?: KeyManager;
  instructions?: InstructionBuilder;
}

/** Malformed request body; always a 400. */
export class RequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestError";
  }
}

// =============================================================================
// Helpers
// =============================================================================

function ok<T>(data: T): SuccessEnvelope<T> {
  return { success: true, data };
}

function fail(error: string): ErrorEnvelope {
  return { success: false, error };
}

async function readBody<T extends z.ZodType>(c: Context, schema: T): Promise<z.output<T>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    throw new RequestError("Invalid JSON body");
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const fields = new Set(
      result.error.issues.map((issue) => (issue.path.length > 0 ? issue.path.map(String).join(".") : "body")),
    );
    throw new RequestError(`Missing or invalid fields: ${[...fields].join(", ")}`);
  }
  return result.data;
}

// =============================================================================
// App Factory
// =============================================================================

export function createApp(options: AppOptions = {}) {
  const log = options.logger ?? NOOP_LOGGER;
  const keys = options.keys ?? new KeyManager();
  const instructions = options.instructions ?? new InstructionBuilder();

  const app = new Hono();

  app.use("*", requestLogger((message, ...rest) => log.info([message, ...rest].join(" "))));

  app.get("/health", (c) => c.json({ ok: true }));

  app.post("/keypair", (c) => {
    const keypair = keys.generate();
    return c.json(ok(keys.encodeKeypair(keypair)));
  });

  // ---------------------------------------------------------------------------
  // Messages
  // ---------------------------------------------------------------------------

  app.post("/message/sign", async (c) => {
    const body = await readBody(c, SignMessageSchema);
    const signed = signMessage(body.message, body.secret, keys);

    return c.json(
      ok({
        signature: signed.signature,
        public_key: signed.publicKey,
        message: signed.message,
      }),
    );
  });

  app.post("/message/verify", async (c) => {
    const body = await readBody(c, VerifyMessageSchema);
    return c.json(ok(verifyMessage(body.message, body.signature, body.pubkey)));
  });

  // ---------------------------------------------------------------------------
  // Instructions
  // ---------------------------------------------------------------------------

  app.post("/token/create", async (c) => {
    const body = await readBody(c, CreateTokenSchema);
    return c.json(ok(instructions.buildInitializeMint(body)));
  });

  app.post("/token/mint", async (c) => {
    const body = await readBody(c, MintTokenSchema);
    return c.json(ok(instructions.buildMintTo(body)));
  });

  app.post("/send/sol", async (c) => {
    const body = await readBody(c, SendSolSchema);
    return c.json(ok(instructions.buildTransferNative(body)));
  });

  app.post("/send/token", async (c) => {
    const body = await readBody(c, SendTokenSchema);
    return c.json(ok(instructions.buildTransferToken(body)));
  });

  // ---------------------------------------------------------------------------
  // Errors
  // ---------------------------------------------------------------------------

  app.notFound((c) => c.json(fail("Not found"), 404));

  app.onError((error, c) => {
    if (error instanceof RequestError) {
      return c.json(fail(error.message), 400);
    }
    if (isLedgerToolsError(error)) {
      log.debug(`Rejected ${c.req.method} ${c.req.path}: ${error.code}`);
      return c.json(fail(error.message), 400);
    }

    log.error(`Unhandled error on ${c.req.method} ${c.req.path}`, error);
    return c.json(fail("Internal server error"), 500);
  });

  return app;
}

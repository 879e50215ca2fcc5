/**
 * Server configuration, read from environment variables.
 */

import * as z from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// A variable that is set but empty counts as unset.
const unsetIfEmpty = (value: unknown) => (value === "" ? undefined : value);

const ConfigSchema = z.object({
  PORT: z.preprocess(unsetIfEmpty, z.coerce.number().int().min(1).max(65535).default(3000)),
  HOST: z.preprocess(unsetIfEmpty, z.string().min(1).default("0.0.0.0")),
  LOG_LEVEL: z.preprocess(unsetIfEmpty, z.enum(LOG_LEVELS).default("info")),
});

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
}

/**
 * Load and validate configuration.
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws Error naming every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return {
    port: result.data.PORT,
    host: result.data.HOST,
    logLevel: result.data.LOG_LEVEL,
  };
}

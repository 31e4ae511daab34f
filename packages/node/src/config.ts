/**
 * @lexledger/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Ledger
  /** JSONL file holding the chain; in-memory when unset */
  LEDGER_FILE: z.string().min(1).optional(),
  LEDGER_APPEND_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),
  LEDGER_MAX_RECORDS: z.coerce.number().int().min(1).default(10000),
  /** Refuse to start on a corrupt chain; the engine's own default is off */
  LEDGER_VERIFY_ON_OPEN: z
    .enum(["true", "false"])
    .default("true")
    .transform((v) => v === "true"),

  // Act used when a request or document does not name one
  ACT_ID: z.string().min(1).default("ACT-UNKNOWN"),
  ACT_TITLE: z.string().default("Unknown Legal Act"),

  // Rate limiting
  RATE_LIMIT_RPM: z.coerce.number().int().min(1).default(1000),
  RATE_LIMIT_BURST: z.coerce.number().int().min(1).default(100),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

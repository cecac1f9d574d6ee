/**
 * @poolvault/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { parsePercentage } from "@poolvault/ledger";

// =============================================================================
// Schema
// =============================================================================

const AddressVar = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, "Expected 0x followed by 40 hex digits")
  .transform((v) => v.toLowerCase());

/** A fraction with up to 18 decimals: "0.003" is 0.3%. */
const FeeVar = z
  .string()
  .regex(/^\d+(\.\d{1,18})?$/, "Expected a decimal fraction such as 0.003")
  .default("0")
  .transform(parsePercentage);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Vault
  VAULT_ADDRESS: AddressVar.default("0x000000000000000000000000000000000000ba17"),
  ADMIN_ADDRESS: AddressVar.default("0x00000000000000000000000000000000000ad314"),

  // Protocol fees
  SWAP_FEE: FeeVar,
  FLASH_LOAN_FEE: FeeVar,
  WITHDRAW_FEE: FeeVar,

  // Reference pool strategy
  MIN_POOL_BALANCE: z
    .string()
    .regex(/^\d+$/, "Expected a non-negative integer")
    .default("1")
    .transform((v) => BigInt(v)),
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

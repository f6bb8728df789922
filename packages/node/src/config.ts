/**
 * @bondline/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Every setting has a development default, so an empty environment
 * boots a working two-domain deployment.
 */

import { z } from "zod";
import type { Address, DomainId } from "@bondline/types";
import { isAddressLike, isDomainId } from "@bondline/types";
import type { Role } from "./types/auth.js";

// =============================================================================
// Field Schemas
// =============================================================================

const address = (fallback: Address) =>
  z.custom<Address>(isAddressLike, { message: "Expected a 20-byte hex address" }).default(fallback);

const domainId = (fallback: DomainId) =>
  z.custom<DomainId>(isDomainId, { message: "Expected a 32-byte hex domain id" }).default(fallback);

const uint = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((v) => /^\d+$/.test(v), { message: "Expected a non-negative integer" })
    .transform((v) => BigInt(v));

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

  // Auth
  API_KEYS: z.string().default(""),

  // Domains
  SOURCE_DOMAIN: domainId(`0x${"00".repeat(31)}01`),
  DESTINATION_DOMAIN: domainId(`0x${"00".repeat(31)}02`),

  // Relay
  RELAY_FEE_TOKEN: address("0x0000000000000000000000000000000000000000"),
  RELAY_FEE_AMOUNT: uint("0"),
  RELAY_GAS_LIMIT: uint("200000"),
  /** 0 disables the scheduler */
  RELAY_INTERVAL_MS: z.coerce.number().int().min(0).default(0),

  // Deployment addresses
  SOURCE_FEED_ADDRESS: address("0x0000000000000000000000000000000000001001"),
  RELAYER_ADDRESS: address("0x0000000000000000000000000000000000001002"),
  ORACLE_ADDRESS: address("0x0000000000000000000000000000000000002001"),
  VAULT_ADDRESS: address("0x0000000000000000000000000000000000002002"),
  ASSET_ADDRESS: address("0x0000000000000000000000000000000000002003"),

  // Bond parties
  ADMIN_ADDRESS: address("0x000000000000000000000000000000000000a001"),
  DEBTOR_ADDRESS: address("0x000000000000000000000000000000000000a002"),
  CREDITOR_ADDRESS: address("0x000000000000000000000000000000000000a003"),
  FEES_RECIPIENT_ADDRESS: address("0x000000000000000000000000000000000000a004"),

  // Bond terms
  BOND_ID: uint("1"),
  DEBT_AMOUNT: uint("1000000000000"),
  BOND_MATURITY: uint("1893456000"),
  FEES_BIPS: z.coerce.number().int().min(0).max(1000).default(100),

  // Asset and pricing
  ASSET_SYMBOL: z.string().min(1).default("USDC"),
  ASSET_DECIMALS: z.coerce.number().int().min(0).max(36).default(6),
  PRICE_DECIMALS: z.coerce.number().int().min(0).max(36).default(8),
  INITIAL_PRICE: uint("100000000"),
  /** Starting asset balance of the debtor and the creditor */
  INITIAL_BALANCE: uint("0"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly address: Address;
}

function isRole(value: string): value is Role {
  return value === "admin" || value === "operator" || value === "viewer";
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:address1,key2:role2:address2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, callerAddress] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || callerAddress === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (!isAddressLike(callerAddress)) {
      throw new Error(`Invalid address "${callerAddress}" in API_KEYS`);
    }

    keys.push({ key, role, address: callerAddress });
  }

  return keys;
}

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

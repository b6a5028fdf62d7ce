/**
 * @starkexit/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isAddress, parseUint } from "@starkexit/types";
import type { Address, Hex } from "@starkexit/types";
import type { ApiKeyRecord, Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const PRIVATE_KEY_PATTERN = /^0x[0-9a-fA-F]{64}$/;

const flag = z
  .string()
  .transform((v) => v === "true")
  .default("false");

export const ConfigSchema = z
  .object({
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

    // Identities the domain checks callers against
    OWNER_IDENTITY: z.string().min(1).default("owner"),
    ROOT_PROVIDER_IDENTITY: z.string().min(1).default("relayer"),

    // Disbursement policy
    ALLOW_ROOT_OVERRIDE: flag,
    DISBURSE_ALLOWED_CALLERS: z.string().default(""),

    // Event log
    EVENT_LOG_PATH: z.string().min(1).default("./data/events.jsonl"),

    // Value transfer
    TRANSFER_MODE: z.enum(["memory", "evm"]).default("memory"),
    MEMORY_CUSTODY: z.string().default(""),
    CHAIN_ID: z.coerce.number().int().min(1).optional(),
    RPC_URL: z.string().url().optional(),
    DISBURSER_PRIVATE_KEY: z
      .string()
      .refine((v): v is Hex => PRIVATE_KEY_PATTERN.test(v), {
        message: "Expected a 0x-prefixed 32-byte hex private key",
      })
      .optional(),
  })
  .superRefine((config, ctx) => {
    if (config.TRANSFER_MODE !== "evm") return;
    for (const key of ["CHAIN_ID", "RPC_URL", "DISBURSER_PRIVATE_KEY"] as const) {
      if (config[key] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when TRANSFER_MODE is "evm"`,
        });
      }
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export type ParsedApiKey = ApiKeyRecord;

const VALID_ROLES: ReadonlySet<string> = new Set<Role>(["admin", "relayer"]);

function isRole(value: string): value is Role {
  return VALID_ROLES.has(value);
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:identity1,key2:role2:identity2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, identity] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || identity === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:identity`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(`Invalid role "${role}" in API_KEYS. Must be: admin or relayer`);
    }
    if (identity === "") {
      throw new Error("Identity cannot be empty in API_KEYS");
    }
    if (seen.has(key)) {
      throw new Error("Duplicate API key in API_KEYS");
    }
    seen.add(key);

    keys.push({ key, role, identity });
  }

  return keys;
}

// =============================================================================
// List Parsing
// =============================================================================

/**
 * Parse DISBURSE_ALLOWED_CALLERS. Empty means no allow-list.
 */
export function parseAllowedCallers(raw: string): readonly string[] | undefined {
  const callers = raw
    .split(",")
    .map((c) => c.trim())
    .filter((c) => c !== "");
  return callers.length === 0 ? undefined : callers;
}

export interface CustodyEntry {
  readonly token: Address;
  readonly amount: bigint;
}

/**
 * Parse MEMORY_CUSTODY, the opening balances of the in-memory transferer.
 *
 * Format: "token1=amount1,token2=amount2"
 */
export function parseCustody(raw: string): readonly CustodyEntry[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const [token, amount, ...rest] = entry.trim().split("=");
    const parsed = amount === undefined ? undefined : parseUint(amount);
    if (token === undefined || !isAddress(token) || parsed === undefined || rest.length > 0) {
      throw new Error(
        `Invalid MEMORY_CUSTODY entry: "${entry.trim()}". Expected format: token=amount`,
      );
    }
    return { token, amount: parsed };
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

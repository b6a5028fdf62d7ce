/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain error codes (LedgerError, DisbursementError,
 * VaultProofError, AccountProofError) to HTTP status codes. Proof
 * errors carry their failure reason in `details.reason`.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<string, ContentfulStatusCode> = {
  // Proofs
  INVALID_VAULT_PROOF: 422,
  INVALID_ACCOUNT_PROOF: 422,

  // Admin lifecycle
  UNAUTHORIZED: 403,
  ADMIN_FINALIZED: 409,
  ALREADY_FINALIZED: 409,
  ROOTS_NOT_COMMITTED: 409,

  // Token registry
  NO_ASSETS_TO_REGISTER: 400,
  ZERO_ASSET_ID: 400,
  INVALID_ASSET_ID: 400,
  INVALID_QUANTUM: 400,
  ZERO_DESTINATION: 400,
  INVALID_DESTINATION: 400,
  ASSET_ALREADY_REGISTERED: 409,

  // Roots
  INVALID_ROOT: 400,
  ROOT_ALREADY_SET: 409,

  // Disbursement
  CALLER_NOT_ALLOWED: 403,
  FUND_ALREADY_DISBURSED: 409,
  CLAIM_ALREADY_EXISTS: 409,
  ASSET_NOT_MAPPED: 422,
  AMOUNT_OVERFLOW: 422,
  TRANSFER_FAILED: 502,
  TRANSFER_UNCONFIRMED: 504,
};

function readString(err: Error, field: "code" | "reason"): string | undefined {
  if (!(field in err)) return undefined;
  const value: unknown = Reflect.get(err, field);
  return typeof value === "string" ? value : undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create the global error handler. Registered as Hono's onError handler.
 *
 * @param onInternalError - Called for every error that maps to 500
 */
export function createErrorHandler(
  onInternalError?: (err: Error, c: Context) => void,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    const code = readString(err, "code");
    const status = (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;

    if (status === 500) {
      onInternalError?.(err, c);
      // Don't leak internal details
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    const reason = readString(err, "reason");
    const envelope = createErrorEnvelope(
      code ?? "INTERNAL_ERROR",
      err.message,
      reason !== undefined ? { reason } : undefined,
    );
    return c.json(envelope, status);
  };
}

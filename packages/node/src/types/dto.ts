/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Integers travel as strings (decimal or 0x-hex) in both directions;
 * JSON numbers cannot hold 252-bit values. Schemas turn them into
 * bigints; shape checks the domain already makes (addresses, roots,
 * proof lengths) are left to the domain so its error codes surface.
 */

import { z } from "zod";
import { parseUint, UINT256_MAX } from "@starkexit/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const UintSchema = z.string().transform((value, ctx) => {
  const parsed = parseUint(value);
  if (parsed === undefined || parsed > UINT256_MAX) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Expected an unsigned 256-bit integer as a decimal or 0x-hex string",
    });
    return z.NEVER;
  }
  return parsed;
});

/** Caps request size; the verifiers enforce the exact bounds. */
const MAX_LIST_LENGTH = 256;

export const VaultProofSchema = z.array(UintSchema).max(MAX_LIST_LENGTH);

export const AccountProofSchema = z.array(z.string()).max(MAX_LIST_LENGTH);

// =============================================================================
// Public DTOs
// =============================================================================

export const DisburseSchema = z.object({
  ownerKey: UintSchema,
  destination: z.string(),
  assetId: UintSchema,
  accountProof: AccountProofSchema,
  vaultProof: VaultProofSchema,
});

export type DisburseDto = z.infer<typeof DisburseSchema>;

export const VerifyVaultProofSchema = z.object({
  proof: VaultProofSchema,
});

export type VerifyVaultProofDto = z.infer<typeof VerifyVaultProofSchema>;

export const VerifyAccountProofSchema = z.object({
  ownerKey: UintSchema,
  destination: z.string(),
  proof: AccountProofSchema,
});

export type VerifyAccountProofDto = z.infer<typeof VerifyAccountProofSchema>;

export const EventsQuerySchema = z.object({
  fromPosition: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type EventsQuery = z.infer<typeof EventsQuerySchema>;

// =============================================================================
// Admin DTOs
// =============================================================================

export const CommitVaultRootSchema = z.object({
  root: UintSchema,
});

export type CommitVaultRootDto = z.infer<typeof CommitVaultRootSchema>;

export const CommitAccountRootSchema = z.object({
  root: z.string(),
});

export type CommitAccountRootDto = z.infer<typeof CommitAccountRootSchema>;

export const RegisterAssetsSchema = z.object({
  assets: z
    .array(
      z.object({
        assetId: UintSchema,
        quantum: UintSchema,
        destinationToken: z.string(),
      }),
    )
    .max(MAX_LIST_LENGTH),
});

export type RegisterAssetsDto = z.infer<typeof RegisterAssetsSchema>;

// =============================================================================
// Response views
// =============================================================================

export interface AssetView {
  readonly assetId: string;
  readonly quantum: string;
  readonly destinationToken: string;
}

export interface ClaimView {
  readonly key: string;
  readonly ownerKey: string;
  readonly assetId: string;
  readonly status: "pending" | "claimed";
  readonly destination?: string;
  readonly token?: string;
  readonly amount?: string;
  /** Set on a pending claim once a transfer was sent but not confirmed */
  readonly transferRef?: string;
  readonly reservedAt?: string;
  readonly claimedAt?: string;
}

export interface ReceiptView {
  readonly key: string;
  readonly ownerKey: string;
  readonly assetId: string;
  readonly vaultId: string;
  readonly destination: string;
  readonly token: string;
  readonly quantizedAmount: string;
  readonly quantum: string;
  readonly amount: string;
  readonly transferRef: string;
  readonly claimedAt: string;
}

export type VaultProofVerdict =
  | {
      readonly valid: true;
      readonly ownerKey: string;
      readonly assetId: string;
      readonly quantizedAmount: string;
      readonly vaultId: string;
      readonly root: string;
      readonly height: number;
      /** Whether the embedded root equals the committed vault root */
      readonly matchesCommittedRoot: boolean;
    }
  | { readonly valid: false; readonly reason: string; readonly message: string };

export type AccountProofVerdict =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: string; readonly message: string };

/**
 * Type barrel: re-exports all public types from @starkexit/node.
 */

// DTOs
export {
  UintSchema,
  VaultProofSchema,
  AccountProofSchema,
  DisburseSchema,
  VerifyVaultProofSchema,
  VerifyAccountProofSchema,
  EventsQuerySchema,
  CommitVaultRootSchema,
  CommitAccountRootSchema,
  RegisterAssetsSchema,
} from "./dto.js";
export type {
  DisburseDto,
  VerifyVaultProofDto,
  VerifyAccountProofDto,
  EventsQuery,
  CommitVaultRootDto,
  CommitAccountRootDto,
  RegisterAssetsDto,
  AssetView,
  ClaimView,
  ReceiptView,
  VaultProofVerdict,
  AccountProofVerdict,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";

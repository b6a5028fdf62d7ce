/**
 * Authentication and authorization types.
 *
 * Privileged routes authenticate with an API key (X-Api-Key header).
 * Each key maps to an identity, which becomes the caller seen by the
 * domain, and a role:
 *
 * - relayer: delivers roots from the messaging adapter
 * - admin:   registers assets and finalizes the admin surface
 *
 * The role only opens the route. The domain still checks the identity
 * (root provider, owner), so a key with the right role but the wrong
 * identity is refused with UNAUTHORIZED.
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "relayer";

export type Permission = "commit-roots" | "configure";

export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  relayer: ["commit-roots"],
  admin: ["configure"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key";
  readonly identity: string;
  readonly role: Role;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly identity: string;
}

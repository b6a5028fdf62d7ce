/**
 * Authentication middleware.
 *
 * API key via the X-Api-Key header, looked up in the configured key
 * registry. On success sets `auth` and `caller`.
 *
 * - authMiddleware: key required (401 without one)
 * - optionalAuthMiddleware: key optional; without one the caller is
 *   "anonymous", with an unknown one the request is still refused
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const ANONYMOUS_CALLER = "anonymous";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const auth = resolve(config, apiKey);
    if (auth === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", auth);
    c.set("caller", auth.identity);
    return next();
  };
}

export function optionalAuthMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      c.set("caller", ANONYMOUS_CALLER);
      return next();
    }

    const auth = resolve(config, apiKey);
    if (auth === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", auth);
    c.set("caller", auth.identity);
    return next();
  };
}

function resolve(config: AuthConfig, apiKey: string): AuthContext | undefined {
  const record = config.apiKeys.get(apiKey);
  if (record === undefined) return undefined;
  return { type: "api-key", identity: record.identity, role: record.role };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Create a permission guard middleware.
 *
 * Must run AFTER authMiddleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(permission: Permission): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope("FORBIDDEN", `Role '${auth.role}' lacks '${permission}' permission`),
        403,
      );
    }
    return next();
  };
}

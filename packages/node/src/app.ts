/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * main.ts serves it; tests call app.request() on it directly.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import type { ApiKeyRecord } from "./types/auth.js";
import type { DisbursementService } from "./services/disbursement-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createPublicRoutes } from "./routes/public.js";
import { createAdminRoutes } from "./routes/admin.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: DisbursementService;
  /** API keys for privileged routes. Without any, admin routes answer 401. */
  readonly apiKeys?: readonly ApiKeyRecord[];
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Called for errors that become a 500 response */
  readonly onInternalError?: (err: Error, c: Context) => void;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: DisbursementService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const auth: AuthConfig = {
    apiKeys: new Map((options.apiKeys ?? []).map((k): [string, ApiKeyRecord] => [k.key, k])),
  };

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onInternalError));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes());

  // ─── Public Routes (no auth required) ───────────────────────────
  app.route("/public/v1", createPublicRoutes(auth));

  // ─── Privileged Routes ──────────────────────────────────────────
  app.use("/api/*", authMiddleware(auth));
  app.route("/api/v1/admin", createAdminRoutes());

  return { app, service };
}

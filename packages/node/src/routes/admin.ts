/**
 * Privileged routes: API key required (mounted under /api/v1/admin).
 *
 * POST /roots/vault     Commit the vault root        (relayer)
 * POST /roots/account   Commit the account root      (relayer)
 * POST /assets          Register token associations  (admin)
 * POST /finalize        Finalize the admin surface   (admin)
 *
 * The key's identity is the caller; the domain checks it against the
 * configured root provider and owner.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CommitAccountRootSchema,
  CommitVaultRootSchema,
  RegisterAssetsSchema,
} from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post(
    "/roots/vault",
    requirePermission("commit-roots"),
    validateBody(CommitVaultRootSchema),
    (c) => {
      const service = c.get("service");
      service.commitVaultRoot(c.get("validated").root, {
        caller: c.get("caller"),
        requestId: c.get("requestId"),
      });
      return c.json({ data: { kind: "vault", root: service.state().vaultRoot } }, 201);
    },
  );

  routes.post(
    "/roots/account",
    requirePermission("commit-roots"),
    validateBody(CommitAccountRootSchema),
    (c) => {
      const service = c.get("service");
      service.commitAccountRoot(c.get("validated").root, {
        caller: c.get("caller"),
        requestId: c.get("requestId"),
      });
      return c.json({ data: { kind: "account", root: service.state().accountRoot } }, 201);
    },
  );

  routes.post(
    "/assets",
    requirePermission("configure"),
    validateBody(RegisterAssetsSchema),
    (c) => {
      const assets = c.get("service").registerAssets(c.get("validated").assets, {
        caller: c.get("caller"),
        requestId: c.get("requestId"),
      });
      return c.json({ data: assets }, 201);
    },
  );

  routes.post("/finalize", requirePermission("configure"), (c) => {
    const state = c.get("service").finalize({
      caller: c.get("caller"),
      requestId: c.get("requestId"),
    });
    return c.json({ data: state });
  });

  return routes;
}

/**
 * Public routes: no API key required.
 *
 * GET  /public/v1/state                          Roots, lifecycle, counts
 * GET  /public/v1/assets                         All token associations
 * GET  /public/v1/assets/:assetId                One token association
 * GET  /public/v1/claims/:ownerKey/:assetId      Claim status
 * GET  /public/v1/events                         Event log page
 * GET  /public/v1/events/integrity               Hash chain check
 * POST /public/v1/proofs/vault/verify            Check a vault proof
 * POST /public/v1/proofs/account/verify          Check an account proof
 * POST /public/v1/disbursements                  Disburse against proofs
 *
 * Disbursement is open to anyone: the proofs authorize the payout. A
 * key may still be presented, which makes its identity the caller for
 * a configured allow-list.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import type { AppEnv } from "../types/api-contract.js";
import {
  DisburseSchema,
  EventsQuerySchema,
  VerifyAccountProofSchema,
  VerifyVaultProofSchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { optionalAuthMiddleware } from "../middleware/auth.js";
import type { AuthConfig } from "../middleware/auth.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { parseUintParam } from "./params.js";

export function createPublicRoutes(auth: AuthConfig): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── CORS ──────────────────────────────────────────────────────
  routes.use(
    "*",
    cors({
      origin: "*",
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "X-Api-Key", "X-Request-Id"],
      maxAge: 86400,
    }),
  );

  // ─── State ─────────────────────────────────────────────────────
  routes.get("/state", (c) => {
    return c.json({ data: c.get("service").state() });
  });

  // ─── Assets ────────────────────────────────────────────────────
  routes.get("/assets", (c) => {
    return c.json({ data: c.get("service").listAssets() });
  });

  routes.get("/assets/:assetId", (c) => {
    const raw = c.req.param("assetId");
    const assetId = parseUintParam(raw);
    if (assetId === undefined) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", `Invalid asset id '${raw}'`), 400);
    }

    const asset = c.get("service").getAsset(assetId);
    if (asset === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Asset ${assetId} is not mapped`), 404);
    }
    return c.json({ data: asset });
  });

  // ─── Claims ────────────────────────────────────────────────────
  routes.get("/claims/:ownerKey/:assetId", (c) => {
    const ownerKey = parseUintParam(c.req.param("ownerKey"));
    const assetId = parseUintParam(c.req.param("assetId"));
    if (ownerKey === undefined || assetId === undefined) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Owner key and asset id must be unsigned integers"),
        400,
      );
    }

    const claim = c.get("service").getClaim(ownerKey, assetId);
    if (claim === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", "No claim for this owner key and asset"), 404);
    }
    return c.json({ data: claim });
  });

  // ─── Events ────────────────────────────────────────────────────
  routes.get("/events", validateQuery(EventsQuerySchema), (c) => {
    const page = c.get("service").listEvents(c.get("validated"));
    return c.json({ data: page.events, nextPosition: page.nextPosition });
  });

  routes.get("/events/integrity", (c) => {
    return c.json({ data: c.get("service").checkIntegrity() });
  });

  // ─── Proof checks ──────────────────────────────────────────────
  routes.post("/proofs/vault/verify", validateBody(VerifyVaultProofSchema), (c) => {
    const { proof } = c.get("validated");
    return c.json({ data: c.get("service").verifyVaultProof(proof) });
  });

  routes.post("/proofs/account/verify", validateBody(VerifyAccountProofSchema), (c) => {
    const { ownerKey, destination, proof } = c.get("validated");
    return c.json({
      data: c.get("service").verifyAccountProof(ownerKey, destination, proof),
    });
  });

  // ─── Disbursement ──────────────────────────────────────────────
  routes.post(
    "/disbursements",
    optionalAuthMiddleware(auth),
    validateBody(DisburseSchema),
    async (c) => {
      const receipt = await c.get("service").disburse(c.get("validated"), {
        caller: c.get("caller"),
        requestId: c.get("requestId"),
      });
      return c.json({ data: receipt }, 201);
    },
  );

  return routes;
}

/**
 * Tests for request logging middleware.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import { createApp } from "../../src/app.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { DisbursementService } from "../../src/services/disbursement-service.js";
import { createTestApp, jsonRequest } from "../setup.js";

describe("loggerMiddleware", () => {
  it("logs one entry per request with the request id", async () => {
    const { system } = createTestApp();
    const entries: RequestLogEntry[] = [];
    const { app } = createApp({
      service: new DisbursementService({ system, logger: pino({ level: "silent" }) }),
      logFn: (entry) => entries.push(entry),
    });

    await app.request(jsonRequest("/public/v1/assets/9", "GET", undefined, { "X-Request-Id": "req-1" }));

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "GET",
      path: "/public/v1/assets/9",
      status: 404,
      requestId: "req-1",
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });
});

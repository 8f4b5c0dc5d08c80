/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (event log hash chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LaunchpadService } from "../services/launchpad-service.js";

export function createHealthRoutes(service: LaunchpadService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyEventLog();
    const body = {
      eventLog: {
        valid: integrity.valid,
        lastVerifiedPosition: integrity.lastVerifiedPosition,
        errors: integrity.errors.length,
      },
      timestamp: new Date().toISOString(),
    };

    if (!service.isReady() || !integrity.valid) {
      return c.json({ status: "not_ready", ...body }, 503);
    }
    return c.json({ status: "ready", ...body }, 200);
  });

  return routes;
}

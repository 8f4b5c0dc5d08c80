/**
 * Attestation routes.
 *
 * GET /api/v1/attestations/:id — Signature attestation by id
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createAttestationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:id", (c) => {
    const service = c.get("service");
    return c.json({ data: service.getAttestation(c.req.param("id")) });
  });

  return routes;
}

/**
 * Creation request routes.
 *
 * POST   /api/v1/requests                 — Submit a creation request
 * GET    /api/v1/requests                 — List requests (cursor pagination)
 * GET    /api/v1/requests/:id             — Get a single request
 * GET    /api/v1/requests/:id/signatures  — Signature set for a request
 * POST   /api/v1/requests/:id/sign        — Approve as the caller
 * POST   /api/v1/requests/:id/unsign      — Withdraw the caller's approval
 * POST   /api/v1/requests/:id/execute     — Administrator recovery execution
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ListRequestsQuerySchema,
  RequestIdParamSchema,
  SubmitRequestSchema,
  toRequestView,
  toSignResultView,
  toUnsignResultView,
} from "../types/dto.js";
import { paginate, REQUEST_ID_KEY } from "../types/pagination.js";
import {
  validateBody,
  validateParams,
  validateQuery,
} from "../middleware/validate.js";
import { requireCaller, requirePermission } from "../middleware/auth.js";

export function createRequestRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/requests — Submit
  routes.post(
    "/",
    requirePermission("write"),
    validateBody(SubmitRequestSchema),
    (c) => {
      const service = c.get("service");
      const caller = requireCaller(c);
      const body = c.req.valid("json");

      const request = service.submitRequest(caller.identity, body.signers, body.tokenSpec);
      return c.json({ data: toRequestView(request) }, 201);
    },
  );

  // GET /api/v1/requests — List
  routes.get("/", validateQuery(ListRequestsQuerySchema), (c) => {
    const service = c.get("service");
    const query = c.req.valid("query");

    const result = paginate(
      service.listRequests(query.status),
      { cursor: query.cursor, limit: query.limit },
      REQUEST_ID_KEY,
    );

    return c.json({
      data: result.data.map(toRequestView),
      pagination: result.pagination,
    });
  });

  // GET /api/v1/requests/:id — Get one
  routes.get("/:id", validateParams(RequestIdParamSchema), (c) => {
    const service = c.get("service");
    const { id } = c.req.valid("param");
    return c.json({ data: toRequestView(service.getRequest(id)) });
  });

  // GET /api/v1/requests/:id/signatures
  routes.get("/:id/signatures", validateParams(RequestIdParamSchema), (c) => {
    const service = c.get("service");
    const { id } = c.req.valid("param");
    return c.json({ data: service.getSignatureSet(id) });
  });

  // POST /api/v1/requests/:id/sign
  routes.post(
    "/:id/sign",
    requirePermission("write"),
    validateParams(RequestIdParamSchema),
    (c) => {
      const service = c.get("service");
      const caller = requireCaller(c);
      const { id } = c.req.valid("param");
      return c.json({ data: toSignResultView(service.sign(id, caller.identity)) });
    },
  );

  // POST /api/v1/requests/:id/unsign
  routes.post(
    "/:id/unsign",
    requirePermission("write"),
    validateParams(RequestIdParamSchema),
    (c) => {
      const service = c.get("service");
      const caller = requireCaller(c);
      const { id } = c.req.valid("param");
      return c.json({ data: toUnsignResultView(service.unsign(id, caller.identity)) });
    },
  );

  // POST /api/v1/requests/:id/execute
  routes.post(
    "/:id/execute",
    requirePermission("admin"),
    validateParams(RequestIdParamSchema),
    (c) => {
      const service = c.get("service");
      const caller = requireCaller(c);
      const { id } = c.req.valid("param");
      return c.json({ data: toRequestView(service.executeRequest(caller.identity, id)) });
    },
  );

  return routes;
}

/**
 * Pool routes.
 *
 * GET    /api/v1/pools/:poolId                   — Pool state
 * POST   /api/v1/pools/:poolId/liquidity         — Deposit as the caller
 * POST   /api/v1/pools/:poolId/liquidity/remove  — Withdraw as the caller
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  LiquidityChangeSchema,
  PoolIdParamSchema,
  toPoolView,
} from "../types/dto.js";
import { validateBody, validateParams } from "../middleware/validate.js";
import { requireCaller, requirePermission } from "../middleware/auth.js";

export function createPoolRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:poolId", validateParams(PoolIdParamSchema), (c) => {
    const service = c.get("service");
    const { poolId } = c.req.valid("param");
    return c.json({ data: toPoolView(service.getPool(poolId)) });
  });

  routes.post(
    "/:poolId/liquidity",
    requirePermission("write"),
    validateParams(PoolIdParamSchema),
    validateBody(LiquidityChangeSchema),
    (c) => {
      const service = c.get("service");
      const caller = requireCaller(c);
      const { poolId } = c.req.valid("param");
      const { amount } = c.req.valid("json");

      const pool = service.addLiquidity(poolId, caller.identity, amount);
      return c.json({ data: toPoolView(pool) });
    },
  );

  routes.post(
    "/:poolId/liquidity/remove",
    requirePermission("write"),
    validateParams(PoolIdParamSchema),
    validateBody(LiquidityChangeSchema),
    (c) => {
      const service = c.get("service");
      const caller = requireCaller(c);
      const { poolId } = c.req.valid("param");
      const { amount } = c.req.valid("json");

      const pool = service.removeLiquidity(poolId, caller.identity, amount);
      return c.json({ data: toPoolView(pool) });
    },
  );

  return routes;
}

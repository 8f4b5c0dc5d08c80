/**
 * Event query routes.
 *
 * GET /api/v1/events            — List all events (cursor pagination)
 * GET /api/v1/events/:streamId  — List events for a stream
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  GLOBAL_POSITION_KEY,
  paginate,
  STREAM_VERSION_KEY,
} from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/events — All events
  routes.get("/", validateQuery(ListEventsQuerySchema), (c) => {
    const service = c.get("service");
    const query = c.req.valid("query");

    const events = service.readAllEvents(
      query.afterPosition !== undefined
        ? { fromPosition: query.afterPosition + 1 }
        : undefined,
    );

    return c.json(
      paginate(
        events,
        { cursor: query.cursor, limit: query.limit },
        GLOBAL_POSITION_KEY,
      ),
    );
  });

  // GET /api/v1/events/:streamId
  routes.get("/:streamId", validateQuery(ListStreamEventsQuerySchema), (c) => {
    const service = c.get("service");
    const streamId = c.req.param("streamId");
    const query = c.req.valid("query");

    const events = service.readStreamEvents(
      streamId,
      query.afterVersion !== undefined
        ? { fromVersion: query.afterVersion + 1 }
        : undefined,
    );

    return c.json(
      paginate(
        events,
        { cursor: query.cursor, limit: query.limit },
        STREAM_VERSION_KEY,
      ),
    );
  });

  return routes;
}

import { z } from "@hono/zod-openapi";
import * as HttpStatusCodes from "stoker/http-status-codes";
import type { AppRouteHandler } from "../../lib/types.ts";
import type { IndexRoute } from "./health.routes.ts";

export const HealthResponseSchema = z.object({
  status: z.enum(["OK", "DEGRADED"]),
  timestamp: z.number(),
  checks: z.object({
    ticket_source: z.object({
      name: z.string(),
      status: z.enum(["ok", "error"]),
      error: z.string().nullable(),
    }),
  }),
}).openapi({
  example: {
    status: "OK",
    timestamp: 1767225600000,
    checks: {
      ticket_source: { name: "files", status: "ok", error: null },
    },
  },
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;

export const index: AppRouteHandler<IndexRoute> = async (c) => {
  const source = await c.var.board.checkSource();
  const response: HealthResponse = {
    status: source.ok ? "OK" : "DEGRADED",
    timestamp: Date.now(),
    checks: {
      ticket_source: {
        name: source.name,
        status: source.ok ? "ok" : "error",
        error: source.error,
      },
    },
  };
  return source.ok
    ? c.json(response, HttpStatusCodes.OK)
    : c.json(response, HttpStatusCodes.SERVICE_UNAVAILABLE);
};

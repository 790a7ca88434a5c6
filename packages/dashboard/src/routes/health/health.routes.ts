import { createRoute } from "@hono/zod-openapi";
import * as HttpStatusCodes from "stoker/http-status-codes";
import { jsonContent } from "stoker/openapi/helpers";
import { HealthResponseSchema } from "./health.handlers.ts";

const tags = ["Health"];

export const index = createRoute({
  path: "/health",
  method: "get",
  tags,
  responses: {
    [HttpStatusCodes.OK]: jsonContent(
      HealthResponseSchema,
      "The health status",
    ),
    [HttpStatusCodes.SERVICE_UNAVAILABLE]: jsonContent(
      HealthResponseSchema,
      "A dependency check failed",
    ),
  },
});

export type IndexRoute = typeof index;

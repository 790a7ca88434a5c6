import { createRoute, z } from "@hono/zod-openapi";
import * as HttpStatusCodes from "stoker/http-status-codes";
import { jsonContent } from "stoker/openapi/helpers";
import { createMessageObjectSchema } from "stoker/openapi/schemas";
import { TicketBoardResponseSchema } from "./tickets.schemas.ts";

const tags = ["Tickets"];

export const board = createRoute({
  path: "/api/tickets/{view}",
  method: "get",
  tags,
  request: {
    params: z.object({
      view: z.string().openapi({
        param: { name: "view", in: "path" },
        example: "helpdesk",
      }),
    }),
    query: z.object({
      agent_id: z.coerce.number().int().optional().openapi({
        param: { name: "agent_id", in: "query" },
        example: 21000012345,
      }),
    }),
  },
  responses: {
    [HttpStatusCodes.OK]: jsonContent(
      TicketBoardResponseSchema,
      "Active tickets of the view, in dashboard sections",
    ),
    [HttpStatusCodes.NOT_FOUND]: jsonContent(
      createMessageObjectSchema("Unsupported view: archive"),
      "Unknown view",
    ),
  },
});

export type BoardRoute = typeof board;

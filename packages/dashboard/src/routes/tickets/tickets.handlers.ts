import * as HttpStatusCodes from "stoker/http-status-codes";
import type { AppRouteHandler } from "../../lib/types.ts";
import { isViewSlug } from "../../tickets/views.ts";
import type { BoardRoute } from "./tickets.routes.ts";
import { toBoardResponse } from "./tickets.schemas.ts";

export const board: AppRouteHandler<BoardRoute> = async (c) => {
  const { view } = c.req.valid("param");
  const { agent_id: agentId } = c.req.valid("query");

  if (!isViewSlug(view)) {
    return c.json(
      { message: `Unsupported view: ${view}` },
      HttpStatusCodes.NOT_FOUND,
    );
  }

  const result = await c.var.board.build(view, agentId);
  return c.json(toBoardResponse(result), HttpStatusCodes.OK);
};

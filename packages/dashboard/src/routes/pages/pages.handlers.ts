import type { Context } from "hono";
import * as HttpStatusCodes from "stoker/http-status-codes";
import { renderBoardPage } from "../../render/page.ts";
import type { AppBindings } from "../../lib/types.ts";
import { DEFAULT_VIEW, isViewSlug } from "../../tickets/views.ts";

type AppContext = Context<AppBindings>;

function agentFilter(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  return Number(value);
}

export const index = (c: AppContext) => {
  return c.redirect(`/${DEFAULT_VIEW}`, HttpStatusCodes.MOVED_TEMPORARILY);
};

async function renderView(c: AppContext, display: boolean) {
  const view = c.req.param("view");
  if (view === undefined || !isViewSlug(view)) {
    return c.notFound();
  }
  const board = await c.var.board.build(
    view,
    display ? undefined : agentFilter(c.req.query("agent_id")),
  );
  const settings = c.var.settings;
  return c.html(renderBoardPage(board, {
    display,
    autoRefreshSeconds: settings.autoRefreshSeconds,
  }));
}

export const dashboard = (c: AppContext) => renderView(c, false);

export const display = (c: AppContext) => renderView(c, true);

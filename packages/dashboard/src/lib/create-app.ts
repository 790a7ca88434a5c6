import { OpenAPIHono } from "@hono/zod-openapi";
import { HTTPException } from "hono/http-exception";
import { notFound, onError } from "stoker/middlewares";
import { defaultHook } from "stoker/openapi";
import { getLogger } from "@deskwatch/utils/logger";
import { pinoLogger } from "../middlewares/pino-logger.ts";
import type { TicketBoard } from "../tickets/board.ts";
import type { AppBindings, AppOpenAPI, AppSettings } from "./types.ts";

export function createRouter() {
  return new OpenAPIHono<AppBindings>({
    strict: false,
    defaultHook,
  });
}

export interface CreateAppOptions {
  board: TicketBoard;
  settings: AppSettings;
  disableReqRes?: boolean;
}

export default function createApp(options: CreateAppOptions) {
  const app = createRouter();
  const logger = getLogger("http");

  app.use(pinoLogger({
    env: options.settings.env,
    disableReqRes: options.disableReqRes ?? false,
  }));
  app.use(async (c, next) => {
    c.set("board", options.board);
    c.set("settings", options.settings);
    await next();
  });

  app.notFound(notFound);
  // The stack is left out of the body when the NODE_ENV binding is
  // "production".
  app.onError((error, c) => {
    if (!(error instanceof HTTPException)) {
      logger.error({ err: error, path: c.req.path }, "unhandled request error");
    }
    return onError(error, c);
  });
  return app;
}

export function createTestApp<R extends AppOpenAPI>(
  router: R,
  options: CreateAppOptions,
) {
  return createApp(options).route("/", router);
}

import type { OpenAPIHono, RouteConfig, RouteHandler } from "@hono/zod-openapi";
import type { PinoLogger } from "hono-pino";
import type { TicketBoard } from "../tickets/board.ts";

export interface AppSettings {
  env: string;
  autoRefreshSeconds: number;
}

export interface AppBindings {
  Bindings: {
    /** Set from `ENV` by the server; "production" hides error stacks. */
    NODE_ENV?: string;
  };
  Variables: {
    logger: PinoLogger;
    board: TicketBoard;
    settings: AppSettings;
  };
}

export type AppOpenAPI = OpenAPIHono<AppBindings>;

export type AppRouteHandler<R extends RouteConfig> = RouteHandler<
  R,
  AppBindings
>;

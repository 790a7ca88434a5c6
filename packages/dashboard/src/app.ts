import createApp, { type CreateAppOptions } from "./lib/create-app.ts";
import configureOpenAPI from "./lib/configure-open-api.ts";
import health from "./routes/health/health.index.ts";
import tickets from "./routes/tickets/tickets.index.ts";
import pages from "./routes/pages/pages.index.ts";

const routes = [
  health,
  tickets,
  pages, // Catches `/:view`, so it goes last.
] as const;

export type AppType = (typeof routes)[number];

export function createDashboardApp(options: CreateAppOptions) {
  const app = createApp(options);

  configureOpenAPI(app);

  routes.forEach((route) => {
    app.route("/", route);
  });

  return app;
}

import { apiReference } from "@scalar/hono-api-reference";

import type { AppOpenAPI } from "./types.ts";

export default function configureOpenAPI(app: AppOpenAPI) {
  app.doc("/doc", {
    openapi: "3.0.0",
    info: {
      version: "0.1.0",
      title: "Deskwatch Dashboard API",
    },
  });

  app.get(
    "/reference",
    apiReference({
      spec: {
        url: "/doc",
      },
    }),
  );
}

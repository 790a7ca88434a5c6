import { createRouter } from "../../lib/create-app.ts";

import * as handlers from "./pages.handlers.ts";

const router = createRouter()
  .get("/", handlers.index)
  .get("/display/:view", handlers.display)
  .get("/:view", handlers.dashboard);

export default router;

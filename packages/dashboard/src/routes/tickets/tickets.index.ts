import { createRouter } from "../../lib/create-app.ts";

import * as handlers from "./tickets.handlers.ts";
import * as routes from "./tickets.routes.ts";

const router = createRouter()
  .openapi(routes.board, handlers.board);

export default router;

export { type AppType, createDashboardApp } from "./app.ts";
export {
  createRouter,
  createTestApp,
  type CreateAppOptions,
} from "./lib/create-app.ts";
export type { AppBindings, AppSettings } from "./lib/types.ts";
export {
  type DashboardEnv,
  DashboardEnvSchema,
  loadDashboardEnv,
} from "./env.ts";
export { renderBoardPage } from "./render/page.ts";
export {
  createBoard,
  type RunningDashboard,
  startDashboard,
} from "./serve.ts";
export {
  type Board,
  type BoardDirectory,
  type BoardItem,
  type BoardSection,
  type SourceCheck,
  TicketBoard,
  type TicketBoardOptions,
} from "./tickets/board.ts";
export {
  freshserviceLinks,
  PsaTicketLinks,
  type TicketLinks,
} from "./tickets/links.ts";
export {
  loadServicesConfig,
  ServiceCallError,
  ServiceClient,
  type ServiceClientOptions,
  type ServicesConfig,
} from "./tickets/service-client.ts";
export {
  FileTicketSource,
  SYNC_SERVICE,
  SyncServiceAgentSource,
  SyncServiceTicketSource,
  type TicketSnapshot,
  type TicketSource,
} from "./tickets/sources.ts";
export {
  DEFAULT_VIEW,
  inView,
  isViewSlug,
  sectionName,
  VIEW_SLUGS,
  VIEWS,
  type ViewSlug,
} from "./tickets/views.ts";
export {
  toBoardResponse,
  type TicketBoardResponse,
  TicketBoardResponseSchema,
} from "./routes/tickets/tickets.schemas.ts";

export {
  loadPollerEnv,
  type PollerEnv,
  PollerEnvSchema,
  resolveApiKey,
} from "./env.ts";
export {
  type CycleReport,
  type TicketApi,
  TicketPoller,
  type TicketPollerOptions,
} from "./poller.ts";

import { access, readFile } from "node:fs/promises";
import { createServer as createHttpsServer } from "node:https";
import { serve, type ServerType } from "@hono/node-server";
import { resolveClassifierConfig } from "@deskwatch/classifier";
import {
  MappingFileSource,
  type NameSource,
  PeopleDirectory,
} from "@deskwatch/directory";
import { TicketStore } from "@deskwatch/ticket-cache";
import { getLogger } from "@deskwatch/utils/logger";
import { createDashboardApp } from "./app.ts";
import type { DashboardEnv } from "./env.ts";
import { TicketBoard } from "./tickets/board.ts";
import { freshserviceLinks, PsaTicketLinks, type TicketLinks } from "./tickets/links.ts";
import { loadServicesConfig, ServiceClient } from "./tickets/service-client.ts";
import {
  FileTicketSource,
  SyncServiceAgentSource,
  SyncServiceTicketSource,
  type TicketSource,
} from "./tickets/sources.ts";

async function bothExist(...paths: string[]): Promise<boolean> {
  try {
    await Promise.all(paths.map((path) => access(path)));
    return true;
  } catch {
    return false;
  }
}

/**
 * Wires the board's collaborators from the environment.
 */
export async function createBoard(env: DashboardEnv): Promise<{
  board: TicketBoard;
  directory: PeopleDirectory;
}> {
  let source: TicketSource;
  let agents: NameSource;
  let links: TicketLinks;

  if (env.TICKET_SOURCE === "sync") {
    const client = new ServiceClient({
      serviceName: env.SERVICE_NAME,
      coreUrl: env.CORE_SERVICE_URL,
      services: await loadServicesConfig(env.SERVICES_FILE),
    });
    source = new SyncServiceTicketSource(client);
    agents = new SyncServiceAgentSource(client);
    links = new PsaTicketLinks(client);
  } else {
    source = new FileTicketSource(new TicketStore({ dir: env.TICKETS_DIR }));
    agents = new MappingFileSource(env.AGENTS_FILE);
    links = freshserviceLinks(env.FRESHSERVICE_DOMAIN);
  }

  const directory = new PeopleDirectory({
    agents,
    requesters: new MappingFileSource(env.REQUESTERS_FILE),
  });
  const board = new TicketBoard({
    source,
    directory,
    links,
    config: resolveClassifierConfig({
      frCriticalHours: env.FR_SLA_CRITICAL_HOURS,
      frWarningHours: env.FR_SLA_WARNING_HOURS,
      updateSlaEnabled: env.UPDATE_SLA_ENABLED,
      precedence: env.BUCKET_PRECEDENCE,
    }),
    professionalServicesGroupId: env.PROFESSIONAL_SERVICES_GROUP_ID,
  });
  return { board, directory };
}

export interface RunningDashboard {
  server: ServerType;
  url: string;
  close(): Promise<void>;
}

/**
 * Starts the dashboard server. HTTPS when both TLS files are present.
 */
export async function startDashboard(
  env: DashboardEnv,
): Promise<RunningDashboard> {
  const logger = getLogger("dashboard");
  const { board, directory } = await createBoard(env);
  await directory.refresh();

  const app = createDashboardApp({
    board,
    settings: { env: env.ENV, autoRefreshSeconds: env.AUTO_REFRESH_SECONDS },
    disableReqRes: env.DISABLE_LOG_REQ_RES,
  });

  const tls = await bothExist(env.TLS_CERT_FILE, env.TLS_KEY_FILE);
  const scheme = tls ? "https" : "http";
  const url = `${scheme}://${env.HOST}:${env.PORT}`;

  // Error bodies follow ENV rather than the process's NODE_ENV.
  const fetch = (request: Request, bindings: object) =>
    app.fetch(request, { ...bindings, NODE_ENV: env.ENV });

  const server = tls
    ? serve({
      fetch,
      hostname: env.HOST,
      port: env.PORT,
      createServer: createHttpsServer,
      serverOptions: {
        cert: await readFile(env.TLS_CERT_FILE),
        key: await readFile(env.TLS_KEY_FILE),
      },
    })
    : serve({ fetch, hostname: env.HOST, port: env.PORT });

  logger.info({ url, source: env.TICKET_SOURCE }, "dashboard listening");

  return {
    server,
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

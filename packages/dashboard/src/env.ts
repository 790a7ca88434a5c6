import { z } from "zod";
import { BucketPrecedenceSchema } from "@deskwatch/classifier";
import { envBoolean, type EnvSource, parseEnv } from "@deskwatch/utils/env";

// NOTE: Dashboard environment variables and their defaults. LOG_LEVEL and
// DISABLE_LOGGING are read by the shared logger.
export const DashboardEnvSchema = z.object({
  ENV: z.string().default("development"),
  HOST: z.string().default("127.0.0.1"),
  PORT: z.coerce.number().int().min(1).max(65535).default(5001),
  DISABLE_LOG_REQ_RES: envBoolean(false),

  // ===========================================================================
  // Ticket source
  //   * files: the poller's cache directory
  //   * sync: the ticket-sync service named `codex` in SERVICES_FILE
  // ===========================================================================
  TICKET_SOURCE: z.enum(["files", "sync"]).default("files"),
  TICKETS_DIR: z.string().default("./tickets"),
  AGENTS_FILE: z.string().default("./agents.txt"),
  REQUESTERS_FILE: z.string().default("./requesters.txt"),
  FRESHSERVICE_DOMAIN: z.string().default(""),
  // ===========================================================================

  // ===========================================================================
  // Views and classification
  // ===========================================================================
  PROFESSIONAL_SERVICES_GROUP_ID: z.coerce.number().int().optional(),
  AUTO_REFRESH_SECONDS: z.coerce.number().int().positive().default(60),
  FR_SLA_CRITICAL_HOURS: z.coerce.number().positive().default(4),
  FR_SLA_WARNING_HOURS: z.coerce.number().positive().default(12),
  UPDATE_SLA_ENABLED: envBoolean(true),
  BUCKET_PRECEDENCE: BucketPrecedenceSchema.default("updateBreachFirst"),
  // ===========================================================================

  // ===========================================================================
  // Service-to-service calls (sync source only)
  // ===========================================================================
  SERVICE_NAME: z.string().default("deskwatch"),
  CORE_SERVICE_URL: z.string().default("http://localhost:5000"),
  SERVICES_FILE: z.string().default("./services.json"),
  // ===========================================================================

  // HTTPS is served only when both files exist.
  TLS_CERT_FILE: z.string().default("./cert.pem"),
  TLS_KEY_FILE: z.string().default("./key.pem"),
});

export type DashboardEnv = z.infer<typeof DashboardEnvSchema>;

export function loadDashboardEnv(source: EnvSource = process.env): DashboardEnv {
  return parseEnv(DashboardEnvSchema, source);
}

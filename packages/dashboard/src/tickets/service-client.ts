import { readFile } from "node:fs/promises";
import { z } from "zod";
import { getLogger, type Logger } from "@deskwatch/utils/logger";
import { errorMessage, isMissing } from "@deskwatch/utils/types";

export const ServicesConfigSchema = z.record(
  z.object({ url: z.string().min(1) }).passthrough(),
);

/** Service name → base URL, as read from `services.json`. */
export type ServicesConfig = z.infer<typeof ServicesConfigSchema>;

const TokenResponseSchema = z.object({ token: z.string().min(1) });

export class ServiceCallError extends Error {
  constructor(
    message: string,
    public readonly service: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, ServiceCallError.prototype);
  }
}

/**
 * Reads `services.json`. A missing file leaves service calls unconfigured.
 */
export async function loadServicesConfig(
  path: string,
  logger: Logger = getLogger("services"),
): Promise<ServicesConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (isMissing(error)) {
      logger.warn({ path }, "services file not found, service calls will fail");
      return {};
    }
    throw error;
  }
  const services = ServicesConfigSchema.parse(JSON.parse(text));
  logger.info({ path, count: Object.keys(services).length }, "services loaded");
  return services;
}

export interface ServiceClientOptions {
  /** Name this process presents to the core service. */
  serviceName: string;
  coreUrl: string;
  services: ServicesConfig;
  tokenTimeoutMs?: number;
  requestTimeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * Authenticated calls to sibling services. Each call asks the core service
 * for a short-lived bearer token scoped to the target.
 */
export class ServiceClient {
  private readonly serviceName: string;
  private readonly coreUrl: string;
  private readonly services: ServicesConfig;
  private readonly tokenTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(options: ServiceClientOptions) {
    this.serviceName = options.serviceName;
    this.coreUrl = options.coreUrl.replace(/\/+$/, "");
    this.services = options.services;
    this.tokenTimeoutMs = options.tokenTimeoutMs ?? 5_000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.fetchFn = options.fetch ?? globalThis.fetch;
    this.logger = options.logger ?? getLogger("services");
  }

  async token(target: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchFn(`${this.coreUrl}/service-token`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          calling_service: this.serviceName,
          target_service: target,
        }),
        signal: AbortSignal.timeout(this.tokenTimeoutMs),
      });
    } catch (error) {
      throw new ServiceCallError(
        `Could not reach core for a ${target} token: ${errorMessage(error)}`,
        "core",
      );
    }
    if (!response.ok) {
      throw new ServiceCallError(
        `Core refused a ${target} token: HTTP ${response.status}`,
        "core",
        response.status,
      );
    }
    const parsed = TokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ServiceCallError("Core token response had no token", "core");
    }
    return parsed.data.token;
  }

  async getJson(service: string, path: string): Promise<unknown> {
    const entry = this.services[service];
    if (!entry) {
      throw new ServiceCallError(
        `Service '${service}' is not listed in the services file`,
        service,
      );
    }
    const token = await this.token(service);
    const url = `${entry.url.replace(/\/+$/, "")}${path}`;
    this.logger.debug({ service, url }, "service call");

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: { Authorization: `Bearer ${token}` },
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      throw new ServiceCallError(
        `${service} ${path} failed: ${errorMessage(error)}`,
        service,
      );
    }
    if (!response.ok) {
      throw new ServiceCallError(
        `${service} ${path} returned HTTP ${response.status}`,
        service,
        response.status,
      );
    }
    try {
      return await response.json();
    } catch (error) {
      throw new ServiceCallError(
        `${service} ${path} returned invalid JSON: ${errorMessage(error)}`,
        service,
        response.status,
      );
    }
  }
}

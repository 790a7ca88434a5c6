import { FreshserviceClient } from "@deskwatch/freshservice";
import { type PollerEnv, resolveApiKey } from "@deskwatch/poller";

/**
 * A Freshservice client configured from the poller environment.
 */
export async function createClient(
  env: PollerEnv,
  signal?: AbortSignal,
): Promise<FreshserviceClient> {
  return new FreshserviceClient({
    domain: env.FRESHSERVICE_DOMAIN,
    apiKey: await resolveApiKey(env),
    perPage: env.PER_PAGE,
    maxPages: env.MAX_PAGES,
    maxRetries: env.MAX_RETRIES,
    retryDelayMs: env.RETRY_DELAY_MS,
    detailRetryDelayMs: env.DETAIL_RETRY_DELAY_MS,
    listTimeoutMs: env.LIST_TIMEOUT_MS,
    detailTimeoutMs: env.DETAIL_TIMEOUT_MS,
    signal,
  });
}

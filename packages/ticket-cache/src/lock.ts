import { mkdir } from "node:fs/promises";
import lockfile from "proper-lockfile";
import { getLogger, type Logger } from "@deskwatch/utils/logger";
import { errorMessage } from "@deskwatch/utils/types";

export class LockHeldError extends Error {
  constructor(readonly path: string) {
    super(`Another poller already holds the lock on ${path}`);
    this.name = "LockHeldError";
  }
}

export interface LockOptions {
  /** Milliseconds without a heartbeat before a lock counts as abandoned. */
  staleMs?: number;
  logger?: Logger;
  onCompromised?: (error: Error) => void;
}

export type ReleaseLock = () => Promise<void>;

/**
 * Single-instance guard for the poller: an advisory lock on the cache
 * directory (`<dir>.lock`), kept fresh by a heartbeat. A lock left behind by
 * a killed process goes stale and is taken over.
 */
export async function acquirePollerLock(
  dir: string,
  options: LockOptions = {},
): Promise<ReleaseLock> {
  const logger = options.logger ?? getLogger("ticket-cache");
  await mkdir(dir, { recursive: true });
  try {
    return await lockfile.lock(dir, {
      stale: options.staleMs ?? 30_000,
      retries: 0,
      realpath: false,
      onCompromised: options.onCompromised ?? ((error) => {
        logger.error({ err: errorMessage(error), dir }, "poller lock compromised");
      }),
    });
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ELOCKED") {
      throw new LockHeldError(dir);
    }
    throw error;
  }
}

export function isPollerLocked(
  dir: string,
  staleMs = 30_000,
): Promise<boolean> {
  return lockfile.check(dir, { stale: staleMs, realpath: false });
}

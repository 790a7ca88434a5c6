export {
  CacheReadError,
  type ReadAllResult,
  TicketStore,
  type TicketStoreOptions,
} from "./store.ts";
export {
  acquirePollerLock,
  isPollerLocked,
  type LockOptions,
  LockHeldError,
  type ReleaseLock,
} from "./lock.ts";

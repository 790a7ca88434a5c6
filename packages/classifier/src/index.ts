export {
  type Bucket,
  type BucketPrecedence,
  BucketPrecedenceSchema,
  BUCKETS,
  type ClassifierConfig,
  type ClassifierOverrides,
  DEFAULT_CLASSIFIER_CONFIG,
  DEFAULT_STATUS_IDS,
  DEFAULT_UPDATE_SLA_MS,
  resolveClassifierConfig,
  type StatusIds,
  updateSlaThreshold,
} from "./config.ts";
export {
  daysOld,
  parseTimestamp,
  priorityText,
  statusText,
  timeSince,
} from "./labels.ts";
export {
  firstResponseSla,
  type FirstResponseSla,
  isUpdateSlaBreached,
  NO_DUE_DATE_URGENCY,
  type SlaClass,
} from "./sla.ts";
export {
  chooseBucket,
  type ClassifyContext,
  classifyTicket,
  type EnrichedTicket,
  type NameLookup,
} from "./classify.ts";
export {
  compareSortKeys,
  compareTickets,
  type GroupedTickets,
  groupTickets,
  totalTickets,
} from "./group.ts";

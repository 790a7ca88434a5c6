import { z } from "zod";

export const BUCKETS = [
  "firstResponse",
  "customerReplied",
  "updateOverdue",
  "otherActive",
] as const;

export type Bucket = typeof BUCKETS[number];

export const BucketPrecedenceSchema = z.enum(["updateBreachFirst", "statusFirst"]);

/**
 * Which rule wins when a ticket is both waiting on an agent and past its
 * update SLA.
 */
export type BucketPrecedence = z.infer<typeof BucketPrecedenceSchema>;

export interface StatusIds {
  open: number;
  pending: number;
  waitingOnCustomer: number;
  updateNeeded: number;
  onHold: number;
  waitingOnAgent: number;
}

export interface ClassifierConfig {
  frCriticalHours: number;
  frWarningHours: number;
  updateSlaEnabled: boolean;
  /** Longest allowed silence since `updated_at`, by priority id. */
  updateSlaMs: Readonly<Record<number, number>>;
  precedence: BucketPrecedence;
  statuses: StatusIds;
}

const MINUTE = 60_000;
const DAY = 24 * 60 * MINUTE;

export const DEFAULT_STATUS_IDS: StatusIds = {
  open: 2,
  pending: 3,
  waitingOnCustomer: 9,
  updateNeeded: 19,
  onHold: 23,
  waitingOnAgent: 26,
};

export const DEFAULT_UPDATE_SLA_MS: Readonly<Record<number, number>> = {
  4: 30 * MINUTE,
  3: 2 * DAY,
  2: 3 * DAY,
  1: 4 * DAY,
};

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  frCriticalHours: 4,
  frWarningHours: 12,
  updateSlaEnabled: true,
  updateSlaMs: DEFAULT_UPDATE_SLA_MS,
  precedence: "updateBreachFirst",
  statuses: DEFAULT_STATUS_IDS,
};

export type ClassifierOverrides =
  & Partial<Omit<ClassifierConfig, "statuses">>
  & { statuses?: Partial<StatusIds> };

export function resolveClassifierConfig(
  overrides: ClassifierOverrides = {},
): ClassifierConfig {
  return {
    ...DEFAULT_CLASSIFIER_CONFIG,
    ...overrides,
    statuses: { ...DEFAULT_STATUS_IDS, ...overrides.statuses },
  };
}

/**
 * Update-SLA threshold for a priority, or undefined when the priority has
 * none.
 */
export function updateSlaThreshold(
  config: Pick<ClassifierConfig, "updateSlaMs">,
  priority: number | null | undefined,
): number | undefined {
  if (priority === null || priority === undefined) return undefined;
  return config.updateSlaMs[priority];
}

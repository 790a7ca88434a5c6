import type { ClassifierConfig } from "./config.ts";
import { updateSlaThreshold } from "./config.ts";

export type SlaClass =
  | "sla-overdue"
  | "sla-critical"
  | "sla-warning"
  | "sla-normal"
  | "sla-none"
  | "sla-responded"
  | "sla-in-progress";

export interface FirstResponseSla {
  text: string;
  slaClass: SlaClass;
  /** Hours until the due date, negative once overdue. */
  hoursRemaining: number;
}

/** Urgency given to tickets without a first-response due date. */
export const NO_DUE_DATE_URGENCY = Number.MAX_SAFE_INTEGER;

const MINUTE_S = 60;
const HOUR_S = 60 * MINUTE_S;
const DAY_S = 24 * HOUR_S;

function scaled(seconds: number): { value: string; unit: string } {
  const magnitude = Math.abs(seconds);
  if (magnitude >= 2 * DAY_S) {
    return { value: (seconds / DAY_S).toFixed(1), unit: "days" };
  }
  if (magnitude >= HOUR_S) {
    return { value: (seconds / HOUR_S).toFixed(1), unit: "hours" };
  }
  if (magnitude >= MINUTE_S) {
    return { value: (seconds / MINUTE_S).toFixed(0), unit: "min" };
  }
  return { value: seconds.toFixed(0), unit: "sec" };
}

export function firstResponseSla(
  due: Date | null,
  now: Date,
  config: Pick<ClassifierConfig, "frCriticalHours" | "frWarningHours">,
): FirstResponseSla {
  if (!due) {
    return {
      text: "No FR Due Date",
      slaClass: "sla-none",
      hoursRemaining: NO_DUE_DATE_URGENCY,
    };
  }
  const seconds = (due.getTime() - now.getTime()) / 1000;
  const hoursRemaining = seconds / HOUR_S;
  const { value, unit } = scaled(seconds);

  if (hoursRemaining < 0) {
    return {
      text: `FR Overdue by ${value.replace(/^-/, "")} ${unit}`,
      slaClass: "sla-overdue",
      hoursRemaining,
    };
  }
  const slaClass: SlaClass = hoursRemaining < config.frCriticalHours
    ? "sla-critical"
    : hoursRemaining < config.frWarningHours
    ? "sla-warning"
    : "sla-normal";
  return { text: `${value} ${unit} for FR`, slaClass, hoursRemaining };
}

/**
 * True when the ticket has gone longer without an update than its priority
 * allows. Tickets without a threshold or a timestamp never breach.
 */
export function isUpdateSlaBreached(
  priority: number | null | undefined,
  updatedAt: Date | null,
  now: Date,
  config: Pick<ClassifierConfig, "updateSlaEnabled" | "updateSlaMs">,
): boolean {
  if (!config.updateSlaEnabled || !updatedAt) return false;
  const threshold = updateSlaThreshold(config, priority);
  if (threshold === undefined) return false;
  return now.getTime() - updatedAt.getTime() > threshold;
}

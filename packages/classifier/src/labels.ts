const STATUS_TEXT: Readonly<Record<number, string>> = {
  2: "Open",
  3: "Pending",
  8: "Scheduled",
  9: "Waiting on Customer",
  10: "Waiting on Third Party",
  13: "Under Investigation",
  19: "Update Needed",
  23: "On Hold",
  26: "Waiting on Agent",
};

const PRIORITY_TEXT: Readonly<Record<number, string>> = {
  1: "Low",
  2: "Medium",
  3: "High",
  4: "Urgent",
};

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

export function statusText(status: number | null | undefined): string {
  if (status === null || status === undefined) return "Unknown Status";
  return STATUS_TEXT[status] ?? `Unknown Status (${status})`;
}

export function priorityText(priority: number | null | undefined): string {
  if (priority === null || priority === undefined) return "Unknown Priority";
  return PRIORITY_TEXT[priority] ?? `P-${priority}`;
}

/**
 * Parses an API timestamp, returning null for missing or unparsable values.
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * "3d ago", "5h ago", "12m ago" or "Just now".
 */
export function timeSince(date: Date | null, now: Date): string {
  if (!date) return "N/A";
  const elapsed = now.getTime() - date.getTime();
  if (elapsed < 0) return "in the future";
  const days = Math.floor(elapsed / DAY);
  if (days >= 1) return `${days}d ago`;
  if (elapsed >= HOUR) return `${Math.floor(elapsed / HOUR)}h ago`;
  if (elapsed >= MINUTE) return `${Math.floor(elapsed / MINUTE)}m ago`;
  return "Just now";
}

function utcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/**
 * Age in UTC calendar days.
 */
export function daysOld(date: Date | null, now: Date): string {
  if (!date) return "N/A";
  const days = Math.round((utcDay(now) - utcDay(date)) / DAY);
  if (days < 0) return "Future Date";
  if (days === 0) return "Today";
  if (days === 1) return "1 day old";
  return `${days} days old`;
}

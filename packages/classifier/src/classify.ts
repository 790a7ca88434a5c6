import type { Ticket } from "@deskwatch/freshservice";
import {
  type Bucket,
  type ClassifierConfig,
  DEFAULT_CLASSIFIER_CONFIG,
} from "./config.ts";
import {
  daysOld,
  parseTimestamp,
  priorityText,
  statusText,
  timeSince,
} from "./labels.ts";
import {
  firstResponseSla,
  isUpdateSlaBreached,
  type SlaClass,
} from "./sla.ts";

/**
 * Turns raw ids into display names. Implemented by the people directory.
 */
export interface NameLookup {
  agentName(id: number | null | undefined): string;
  requesterName(id: number | null | undefined): string;
}

export interface ClassifyContext {
  now: Date;
  config?: ClassifierConfig;
  directory?: NameLookup;
}

/**
 * A ticket as shown on the dashboard: the raw fields it came from, display
 * text, its bucket and the key it sorts by inside that bucket.
 */
export interface EnrichedTicket {
  id: number;
  subject: string;
  requesterId: number | null;
  responderId: number | null;
  groupId: number | null;
  status: number | null;
  priority: number | null;
  type: string;
  descriptionText: string;
  frDueBy: string | null;
  updatedAt: string | null;
  createdAt: string | null;
  firstRespondedAt: string | null;
  agentName: string;
  requesterName: string;
  statusText: string;
  priorityText: string;
  updatedFriendly: string;
  createdDaysOld: string;
  agentRespondedFriendly: string;
  slaText: string;
  slaClass: SlaClass;
  needsFirstResponse: boolean;
  updateSlaBreached: boolean;
  bucket: Bucket;
  sortKey: number[];
}

const placeholderNames: NameLookup = {
  agentName: (id) =>
    id === null || id === undefined ? "Unassigned" : `Agent ID: ${id}`,
  requesterName: (id) =>
    id === null || id === undefined ? "N/A" : `Req. ID: ${id}`,
};

interface BucketInput {
  status: number | null;
  needsFirstResponse: boolean;
  breached: boolean;
}

/**
 * Applies the configured precedence. Each rule either claims the ticket or
 * passes it on; `otherActive` catches the rest.
 */
export function chooseBucket(
  input: BucketInput,
  config: ClassifierConfig = DEFAULT_CLASSIFIER_CONFIG,
): Bucket {
  const { statuses } = config;
  const breach = (): Bucket | undefined =>
    input.breached ? "updateOverdue" : undefined;
  const replied = (): Bucket | undefined =>
    input.status === statuses.waitingOnAgent ? "customerReplied" : undefined;
  const rules = config.precedence === "statusFirst"
    ? [replied, breach]
    : [breach, replied];

  for (const rule of rules) {
    const bucket = rule();
    if (bucket) return bucket;
  }
  const active = [statuses.open, statuses.pending, statuses.updateNeeded];
  if (
    input.needsFirstResponse ||
    (input.status !== null && active.includes(input.status))
  ) {
    return "firstResponse";
  }
  return "otherActive";
}

/**
 * Classifies one raw ticket. Pure: the same ticket and `now` always give the
 * same record.
 */
export function classifyTicket(
  raw: Ticket,
  context: ClassifyContext,
): EnrichedTicket {
  const { now } = context;
  const config = context.config ?? DEFAULT_CLASSIFIER_CONFIG;
  const names = context.directory ?? placeholderNames;
  const { statuses } = config;

  const status = raw.status ?? null;
  const priority = raw.priority ?? null;
  const firstRespondedAt = raw.stats?.first_responded_at || null;
  const frDue = parseTimestamp(raw.fr_due_by);
  const updated = parseTimestamp(raw.updated_at);
  const created = parseTimestamp(raw.created_at);
  const agentResponded = parseTimestamp(raw.stats?.agent_responded_at);

  const updatedFriendly = timeSince(updated, now);
  const agentRespondedFriendly = timeSince(agentResponded, now);
  const currentStatus = statusText(status);

  const needsFirstResponse = firstRespondedAt === null &&
    (status === statuses.open || frDue !== null);
  const breached = isUpdateSlaBreached(priority, updated, now, config);
  const bucket = chooseBucket({ status, needsFirstResponse, breached }, config);

  let slaText = `${currentStatus} (${updatedFriendly})`;
  let slaClass: SlaClass = "sla-in-progress";
  let frHours = 0;

  if (needsFirstResponse) {
    const sla = firstResponseSla(frDue, now, config);
    slaText = sla.text;
    slaClass = sla.slaClass;
    frHours = sla.hoursRemaining;
  } else if (breached) {
    slaText = `Update Overdue (${updatedFriendly})`;
    slaClass = "sla-overdue";
  } else if (status === statuses.open) {
    slaText = `Open (${updatedFriendly})`;
    slaClass = "sla-responded";
  } else if (status === statuses.waitingOnAgent) {
    slaText = `Waiting on Agent (${updatedFriendly})`;
    slaClass = "sla-warning";
  } else if (status === statuses.waitingOnCustomer) {
    slaText = agentRespondedFriendly === "N/A"
      ? "Waiting on Customer"
      : `Waiting on Customer (Agent: ${agentRespondedFriendly})`;
    slaClass = "sla-responded";
  } else if (status === statuses.onHold) {
    slaText = `On Hold (${updatedFriendly})`;
    slaClass = "sla-none";
  } else if (status === statuses.pending) {
    slaText = `Pending (${updatedFriendly})`;
  }

  const updatedMs = updated ? updated.getTime() : 0;
  const negatedPriority = 0 - (priority ?? 0);
  const sortKey = bucket === "firstResponse"
    ? [
      breached ? 0 : 1,
      needsFirstResponse ? 0 : 1,
      frHours,
      negatedPriority,
      updatedMs,
    ]
    : [breached ? 0 : 1, negatedPriority, updatedMs];

  return {
    id: raw.id,
    subject: raw.subject ?? "No Subject Provided",
    requesterId: raw.requester_id ?? null,
    responderId: raw.responder_id ?? null,
    groupId: raw.group_id ?? null,
    status,
    priority,
    type: raw.type ?? "N/A",
    descriptionText: raw.description_text ?? "",
    frDueBy: raw.fr_due_by ?? null,
    updatedAt: raw.updated_at ?? null,
    createdAt: raw.created_at ?? null,
    firstRespondedAt,
    agentName: names.agentName(raw.responder_id),
    requesterName: names.requesterName(raw.requester_id),
    statusText: currentStatus,
    priorityText: priorityText(priority),
    updatedFriendly,
    createdDaysOld: daysOld(created, now),
    agentRespondedFriendly,
    slaText,
    slaClass,
    needsFirstResponse,
    updateSlaBreached: breached,
    bucket,
    sortKey,
  };
}

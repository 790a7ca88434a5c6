import type { Bucket } from "@deskwatch/classifier";
import type { Ticket } from "@deskwatch/freshservice";

export const VIEWS = {
  "helpdesk": "Helpdesk",
  "professional-services": "Professional Services",
} as const;

export type ViewSlug = keyof typeof VIEWS;

export const VIEW_SLUGS: readonly ViewSlug[] = [
  "helpdesk",
  "professional-services",
];

export const DEFAULT_VIEW: ViewSlug = "helpdesk";

export function isViewSlug(value: string): value is ViewSlug {
  return Object.hasOwn(VIEWS, value);
}

/**
 * Professional-services tickets are those in the configured group; the
 * helpdesk view has everything else.
 */
export function inView(
  ticket: Pick<Ticket, "group_id">,
  view: ViewSlug,
  professionalServicesGroupId: number | undefined,
): boolean {
  const professional = professionalServicesGroupId !== undefined &&
    ticket.group_id === professionalServicesGroupId;
  return view === "professional-services" ? professional : !professional;
}

export function assignedTo(
  ticket: Pick<Ticket, "responder_id">,
  agentId: number | undefined,
): boolean {
  return agentId === undefined || ticket.responder_id === agentId;
}

/** Page order of the buckets. */
export const SECTION_BUCKETS: readonly Bucket[] = [
  "firstResponse",
  "customerReplied",
  "updateOverdue",
  "otherActive",
];

export function sectionName(bucket: Bucket, view: ViewSlug): string {
  const display = VIEWS[view];
  switch (bucket) {
    case "firstResponse":
      return `Open ${display} Tickets`;
    case "customerReplied":
      return "Customer Replied";
    case "updateOverdue":
      return "Needs Agent / Update Overdue";
    case "otherActive":
      return `Other Active ${display} Tickets`;
  }
}

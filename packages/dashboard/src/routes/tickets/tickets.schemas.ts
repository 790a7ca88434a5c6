import { z } from "@hono/zod-openapi";
import { BUCKETS } from "@deskwatch/classifier";
import type { Board } from "../../tickets/board.ts";

const nullableId = z.number().int().nullable();

export const TicketItemSchema = z.object({
  id: z.number().int(),
  subject: z.string(),
  requesterId: nullableId,
  responderId: nullableId,
  groupId: nullableId,
  status: nullableId,
  priority: nullableId,
  type: z.string(),
  descriptionText: z.string(),
  frDueBy: z.string().nullable(),
  updatedAt: z.string().nullable(),
  createdAt: z.string().nullable(),
  firstRespondedAt: z.string().nullable(),
  agentName: z.string(),
  requesterName: z.string(),
  statusText: z.string(),
  priorityText: z.string(),
  updatedFriendly: z.string(),
  createdDaysOld: z.string(),
  agentRespondedFriendly: z.string(),
  slaText: z.string(),
  slaClass: z.string(),
  needsFirstResponse: z.boolean(),
  updateSlaBreached: z.boolean(),
  bucket: z.enum(BUCKETS),
  sortKey: z.array(z.number()),
  url: z.string().nullable(),
}).openapi("TicketItem");

export const TicketBoardResponseSchema = z.object({
  s1_items: z.array(TicketItemSchema),
  s2_items: z.array(TicketItemSchema),
  s3_items: z.array(TicketItemSchema),
  s4_items: z.array(TicketItemSchema),
  total_active_items: z.number().int(),
  dashboard_generated_time_iso: z.string(),
  view: z.string(),
  section1_name_js: z.string(),
  section2_name_js: z.string(),
  section3_name_js: z.string(),
  section4_name_js: z.string(),
  source_error: z.string().nullable(),
}).openapi("TicketBoard");

export type TicketBoardResponse = z.infer<typeof TicketBoardResponseSchema>;

/**
 * The JSON shape the page script polls: four sections, their names and the
 * generation time.
 */
export function toBoardResponse(board: Board): TicketBoardResponse {
  const [s1, s2, s3, s4] = board.sections;
  return {
    s1_items: s1.items,
    s2_items: s2.items,
    s3_items: s3.items,
    s4_items: s4.items,
    total_active_items: board.total,
    dashboard_generated_time_iso: board.generatedAt,
    view: board.viewName,
    section1_name_js: s1.name,
    section2_name_js: s2.name,
    section3_name_js: s3.name,
    section4_name_js: s4.name,
    source_error: board.sourceError,
  };
}

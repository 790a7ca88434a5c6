import { z } from "zod";

const timestamp = z.string().nullable().optional();
const id = z.number().int().nullable().optional();

export const TicketStatsSchema = z.object({
  first_responded_at: timestamp,
  agent_responded_at: timestamp,
  status_updated_at: timestamp,
}).passthrough();

// Cached verbatim, so every field the API sends survives a round trip.
export const TicketSchema = z.object({
  id: z.number().int(),
  subject: z.string().nullable().optional(),
  requester_id: id,
  responder_id: id,
  group_id: id,
  status: z.number().int().nullable().optional(),
  priority: z.number().int().nullable().optional(),
  type: z.string().nullable().optional(),
  description_text: z.string().nullable().optional(),
  fr_due_by: timestamp,
  due_by: timestamp,
  created_at: timestamp,
  updated_at: timestamp,
  stats: TicketStatsSchema.nullable().optional(),
}).passthrough();

export type Ticket = z.infer<typeof TicketSchema>;
export type TicketStats = z.infer<typeof TicketStatsSchema>;

export const BasicTicketSchema = z.object({
  id: z.number().int(),
}).passthrough();

export type BasicTicket = z.infer<typeof BasicTicketSchema>;

export const TicketListResponseSchema = z.object({
  tickets: z.array(z.unknown()).default([]),
});

export const TicketDetailResponseSchema = z.object({
  ticket: TicketSchema,
});

export const PersonSchema = z.object({
  id: z.number().int(),
  first_name: z.string().nullable().optional(),
  last_name: z.string().nullable().optional(),
  email: z.string().nullable().optional(),
  primary_email: z.string().nullable().optional(),
  active: z.boolean().optional(),
}).passthrough();

export type Person = z.infer<typeof PersonSchema>;

export const RequesterListResponseSchema = z.object({
  requesters: z.array(PersonSchema).default([]),
});

export const AgentListResponseSchema = z.object({
  agents: z.array(PersonSchema).default([]),
});

/**
 * "First Last", falling back to the e-mail address, then to the id.
 */
export function personDisplayName(person: Person): string {
  const name = [person.first_name, person.last_name]
    .filter((part): part is string => !!part && part.trim() !== "")
    .map((part) => part.trim())
    .join(" ");
  return name || person.primary_email || person.email || `ID: ${person.id}`;
}

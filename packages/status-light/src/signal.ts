import type { TicketStates } from "./states.ts";

export type Rgb = readonly [red: number, green: number, blue: number];

export const COLORS = {
  red: [255, 0, 0],
  yellow: [255, 180, 0],
  green: [0, 255, 0],
  magenta: [255, 0, 255],
  dim: [20, 20, 20],
} as const satisfies Record<string, Rgb>;

export const STROBE_SPEED = 15;
/** 0 repeats forever. */
export const STROBE_REPEAT = 0;

export type LightSignal =
  | { kind: "static"; color: Rgb; reason: string }
  | {
    kind: "strobe";
    color: Rgb;
    speed: number;
    repeat: number;
    reason: string;
  };

/**
 * Picks the light for the current ticket states. First match wins:
 * read errors, overdue first responses, open, waiting on agent, idle.
 */
export function chooseSignal(states: TicketStates): LightSignal {
  if (states.error > 0) {
    return {
      kind: "static",
      color: COLORS.magenta,
      reason: `${states.error} ticket file(s) unreadable`,
    };
  }
  if (states.frOverdue > 0) {
    return {
      kind: "strobe",
      color: COLORS.red,
      speed: STROBE_SPEED,
      repeat: STROBE_REPEAT,
      reason: `${states.frOverdue} first response(s) overdue`,
    };
  }
  if (states.open > 0) {
    return {
      kind: "static",
      color: COLORS.red,
      reason: `${states.open} open ticket(s)`,
    };
  }
  if (states.waitingAgent > 0) {
    return {
      kind: "static",
      color: COLORS.yellow,
      reason: `${states.waitingAgent} ticket(s) waiting on an agent`,
    };
  }
  return { kind: "static", color: COLORS.green, reason: "nothing actionable" };
}

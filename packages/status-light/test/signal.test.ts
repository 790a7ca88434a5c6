import { describe, expect, it } from "vitest";
import {
  chooseSignal,
  staticReport,
  strobeReport,
  type TicketStates,
} from "@deskwatch/status-light";

const idle: TicketStates = { open: 0, waitingAgent: 0, frOverdue: 0, error: 0 };

describe("chooseSignal", () => {
  it("shows solid green when nothing needs attention", () => {
    expect(chooseSignal(idle)).toMatchObject({
      kind: "static",
      color: [0, 255, 0],
    });
  });

  it("shows solid yellow for tickets waiting on an agent", () => {
    expect(chooseSignal({ ...idle, waitingAgent: 2 })).toMatchObject({
      kind: "static",
      color: [255, 180, 0],
    });
  });

  it("lets open tickets outrank waiting ones", () => {
    expect(chooseSignal({ ...idle, open: 1, waitingAgent: 3 })).toMatchObject(
      { kind: "static", color: [255, 0, 0] },
    );
  });

  it("strobes red for overdue first responses", () => {
    expect(chooseSignal({ ...idle, open: 2, frOverdue: 1 })).toEqual({
      kind: "strobe",
      color: [255, 0, 0],
      speed: 15,
      repeat: 0,
      reason: "1 first response(s) overdue",
    });
  });

  it("shows magenta over everything when files are unreadable", () => {
    expect(
      chooseSignal({ open: 4, waitingAgent: 1, frOverdue: 2, error: 1 }),
    ).toMatchObject({ kind: "static", color: [255, 0, 255] });
  });
});

describe("Luxafor reports", () => {
  it("sets all LEDs to a static colour", () => {
    expect(staticReport([255, 180, 0])).toEqual([0, 1, 255, 255, 180, 0]);
  });

  it("encodes strobe speed and repeat", () => {
    expect(strobeReport([255, 0, 0], 15, 0)).toEqual([
      0,
      3,
      255,
      255,
      0,
      0,
      15,
      0,
      0,
    ]);
  });
});

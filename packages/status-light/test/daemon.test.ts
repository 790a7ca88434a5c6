import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TicketStore } from "@deskwatch/ticket-cache";
import {
  countTicketStates,
  LuxaforDevice,
  StatusLight,
} from "@deskwatch/status-light";
import { FakeLight } from "./fake-device.ts";

const NOW = new Date("2026-03-10T12:00:00Z");
const past = "2026-03-10T10:00:00Z";
const future = "2026-03-10T16:00:00Z";

describe("status light", () => {
  let dir: string;
  let store: TicketStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "deskwatch-light-"));
    store = new TicketStore({ dir });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("countTicketStates", () => {
    it("counts open, waiting and overdue tickets", async () => {
      await store.write({
        id: 1,
        status: 2,
        fr_due_by: past,
        stats: { first_responded_at: null },
      });
      await store.write({ id: 2, status: 2, fr_due_by: future });
      await store.write({
        id: 3,
        status: 2,
        fr_due_by: past,
        stats: { first_responded_at: "2026-03-10T09:00:00Z" },
      });
      await store.write({ id: 4, status: 26 });
      await store.write({ id: 5, status: 23 });

      await expect(countTicketStates(store, NOW)).resolves.toEqual({
        open: 3,
        waitingAgent: 1,
        frOverdue: 1,
        error: 0,
      });
    });

    it("counts unreadable files as errors", async () => {
      await store.write({ id: 1, status: 2 });
      await writeFile(join(dir, "2.txt"), "{ broken", "utf-8");
      await expect(countTicketStates(store, NOW)).resolves.toEqual({
        open: 1,
        waitingAgent: 0,
        frOverdue: 0,
        error: 1,
      });
    });

    it("does not count a ticket archived mid-read as an error", async () => {
      class StaleListingStore extends TicketStore {
        override async listIds(): Promise<Set<number>> {
          return new Set([1, 42]);
        }
      }
      const stale = new StaleListingStore({ dir });
      await stale.write({ id: 1, status: 26 });
      await expect(countTicketStates(stale, NOW)).resolves.toEqual({
        open: 0,
        waitingAgent: 1,
        frOverdue: 0,
        error: 0,
      });
    });

    it("reports a missing directory as one error", async () => {
      const missing = new TicketStore({ dir: join(dir, "nope") });
      await expect(countTicketStates(missing, NOW)).resolves.toEqual({
        open: 0,
        waitingAgent: 0,
        frOverdue: 0,
        error: 1,
      });
    });
  });

  describe("StatusLight", () => {
    const setup = (devices: Array<FakeLight | Error>) => {
      const connect = vi.fn(async () => {
        const next = devices.shift();
        if (next === undefined || next instanceof Error) {
          throw next ?? new Error("no device");
        }
        return next;
      });
      const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
      const light = new StatusLight({
        store,
        connect,
        intervalMs: 10_000,
        sleep,
        now: () => NOW,
      });
      return { light, connect, sleep };
    };

    it("blinks dimly on connect", async () => {
      const device = new FakeLight();
      const { light, sleep } = setup([device]);

      await expect(light.connect()).resolves.toBe(true);
      expect(device.commands).toEqual([["static", [20, 20, 20]], ["off"]]);
      expect(sleep).toHaveBeenCalledWith(100);
    });

    it("switches off before showing the colour", async () => {
      await store.write({ id: 1, status: 26 });
      const device = new FakeLight();
      const { light } = setup([device]);

      const result = await light.update();

      expect(result.status).toBe("shown");
      expect(device.commands.slice(2)).toEqual([
        ["off"],
        ["static", [255, 180, 0]],
      ]);
    });

    it("strobes for an overdue first response", async () => {
      await store.write({ id: 1, status: 2, fr_due_by: past });
      const device = new FakeLight();
      const { light } = setup([device]);

      await light.update();
      expect(device.commands.at(-1)).toEqual(["strobe", [255, 0, 0], 15, 0]);
    });

    it("drops a failing device and reconnects on the next cycle", async () => {
      const first = new FakeLight();
      const second = new FakeLight();
      const { light, connect } = setup([first, second]);

      await light.connect();
      first.failing = true;
      await expect(light.update()).resolves.toEqual({
        status: "failed",
        error: "device unplugged",
      });
      expect(light.connected).toBe(false);
      expect(first.commands.at(-1)).toEqual(["close"]);

      const result = await light.update();
      expect(result.status).toBe("shown");
      expect(connect).toHaveBeenCalledTimes(2);
      expect(second.commands.at(-1)).toEqual(["static", [0, 255, 0]]);
    });

    it("stays disconnected while no device is attached", async () => {
      const { light } = setup([new Error("no device")]);
      await expect(light.update()).resolves.toEqual({
        status: "disconnected",
      });
    });

    it("switches the light off when the loop stops", async () => {
      const device = new FakeLight();
      const { light, sleep } = setup([device]);
      const controller = new AbortController();
      sleep.mockImplementation(async (ms) => {
        if (ms === 10_000) controller.abort();
      });

      await light.run(controller.signal);

      expect(device.commands.slice(-3)).toEqual([
        ["static", [0, 255, 0]],
        ["off"],
        ["close"],
      ]);
      expect(light.connected).toBe(false);
    });

    it("opens the light just to switch it off when it was never connected", async () => {
      const device = new FakeLight();
      const { light } = setup([device]);
      await light.shutdown();
      expect(device.commands).toEqual([["off"], ["close"]]);
    });
  });

  describe("LuxaforDevice", () => {
    it("writes reports to the HID handle", async () => {
      const hid = { write: vi.fn((_values: number[]) => 6), close: vi.fn() };
      const device = new LuxaforDevice(hid);

      await device.staticColor([255, 0, 255]);
      await device.off();
      await device.close();

      expect(hid.write.mock.calls).toEqual([
        [[0, 1, 255, 255, 0, 255]],
        [[0, 1, 255, 0, 0, 0]],
      ]);
      expect(hid.close).toHaveBeenCalledTimes(1);
    });

    it("rejects when the write fails", async () => {
      const hid = { write: vi.fn((_values: number[]) => -1), close: vi.fn() };
      await expect(new LuxaforDevice(hid).off()).rejects.toThrow(
        "HID write failed (-1)",
      );
    });
  });
});

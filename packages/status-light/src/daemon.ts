import type { TicketStore } from "@deskwatch/ticket-cache";
import { getLogger, type Logger } from "@deskwatch/utils/logger";
import { sleep as defaultSleep, type Sleep } from "@deskwatch/utils/sleep";
import { errorMessage } from "@deskwatch/utils/types";
import type { LightDevice } from "./device.ts";
import { chooseSignal, COLORS, type LightSignal } from "./signal.ts";
import { countTicketStates, type TicketStates } from "./states.ts";

export interface StatusLightOptions {
  store: TicketStore;
  /** Opens the device; rejects when none is attached. */
  connect: () => Promise<LightDevice>;
  intervalMs?: number;
  /** How long the dim connection-test blink stays on. */
  blinkMs?: number;
  sleep?: Sleep;
  now?: () => Date;
  logger?: Logger;
}

export type UpdateResult =
  | { status: "shown"; states: TicketStates; signal: LightSignal }
  | { status: "disconnected" }
  | { status: "failed"; error: string };

/**
 * Mirrors the ticket cache on a USB light. A device that fails a command is
 * dropped and reopened on a later cycle.
 */
export class StatusLight {
  private device: LightDevice | null = null;
  private readonly store: TicketStore;
  private readonly connectDevice: () => Promise<LightDevice>;
  private readonly intervalMs: number;
  private readonly blinkMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: StatusLightOptions) {
    this.store = options.store;
    this.connectDevice = options.connect;
    this.intervalMs = options.intervalMs ?? 10_000;
    this.blinkMs = options.blinkMs ?? 100;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? getLogger("status-light");
  }

  get connected(): boolean {
    return this.device !== null;
  }

  /**
   * Opens the device and blinks it once. Resolves false when that fails.
   */
  async connect(): Promise<boolean> {
    this.logger.info("connecting to status light");
    let device: LightDevice;
    try {
      device = await this.connectDevice();
    } catch (error) {
      this.logger.error({ err: errorMessage(error) }, "could not open light");
      return false;
    }
    try {
      await device.staticColor(COLORS.dim);
      await this.sleep(this.blinkMs);
      await device.off();
    } catch (error) {
      this.logger.error(
        { err: errorMessage(error) },
        "light failed its test blink",
      );
      await this.closeQuietly(device);
      return false;
    }
    this.device = device;
    this.logger.info("status light connected");
    return true;
  }

  /** One cycle: count the cache, show the signal. */
  async update(): Promise<UpdateResult> {
    if (!this.device && !await this.connect()) {
      return { status: "disconnected" };
    }
    const device = this.device;
    if (!device) return { status: "disconnected" };

    const states = await countTicketStates(this.store, this.now(), {
      logger: this.logger,
    });
    const signal = chooseSignal(states);
    this.logger.debug({ ...states }, "ticket states");

    try {
      await device.off();
      if (signal.kind === "strobe") {
        await device.strobe(signal.color, signal.speed, signal.repeat);
      } else {
        await device.staticColor(signal.color);
      }
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(
        { err: message },
        "light command failed, reconnecting next cycle",
      );
      this.device = null;
      await this.closeQuietly(device);
      return { status: "failed", error: message };
    }
    this.logger.info({ signal: signal.kind, color: signal.color }, signal.reason);
    return { status: "shown", states, signal };
  }

  /**
   * Updates every interval until `signal` aborts, then switches the light
   * off.
   */
  async run(signal?: AbortSignal): Promise<void> {
    this.logger.info(
      { dir: this.store.dir, intervalMs: this.intervalMs },
      "status light started",
    );
    while (!signal?.aborted) {
      try {
        await this.update();
      } catch (error) {
        this.logger.error({ err: errorMessage(error) }, "light cycle crashed");
      }
      await this.sleep(this.intervalMs, signal);
    }
    await this.shutdown();
  }

  /** Switches the light off and releases it, opening it first if needed. */
  async shutdown(): Promise<void> {
    let device = this.device;
    this.device = null;
    if (!device) {
      try {
        device = await this.connectDevice();
      } catch (error) {
        this.logger.warn(
          { err: errorMessage(error) },
          "no light to switch off on exit",
        );
        return;
      }
    }
    try {
      await device.off();
      this.logger.info("status light switched off");
    } catch (error) {
      this.logger.warn(
        { err: errorMessage(error) },
        "could not switch the light off",
      );
    }
    await this.closeQuietly(device);
  }

  private async closeQuietly(device: LightDevice): Promise<void> {
    try {
      await device.close();
    } catch (error) {
      this.logger.debug({ err: errorMessage(error) }, "close failed");
    }
  }
}

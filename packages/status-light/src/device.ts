import type { Rgb } from "./signal.ts";

/**
 * The three things the daemon asks of a light.
 */
export interface LightDevice {
  staticColor(color: Rgb): Promise<void>;
  strobe(color: Rgb, speed: number, repeat: number): Promise<void>;
  off(): Promise<void>;
  close(): Promise<void>;
}

export const LUXAFOR_VENDOR_ID = 0x04d8;
export const LUXAFOR_PRODUCT_ID = 0xf372;

const ALL_LEDS = 255;
const MODE_STATIC = 1;
const MODE_STROBE = 3;

// Leading 0 is the HID report id.
export function staticReport([r, g, b]: Rgb): number[] {
  return [0, MODE_STATIC, ALL_LEDS, r, g, b];
}

export function strobeReport(
  [r, g, b]: Rgb,
  speed: number,
  repeat: number,
): number[] {
  return [0, MODE_STROBE, ALL_LEDS, r, g, b, speed, 0, repeat];
}

/** The part of a node-hid handle the driver uses. */
export interface HidHandle {
  write(values: number[]): number;
  close(): void;
}

/**
 * Luxafor Flag over USB HID.
 */
export class LuxaforDevice implements LightDevice {
  constructor(private readonly hid: HidHandle) {}

  /**
   * Opens the first attached flag. node-hid is loaded here so that nothing
   * else in the package needs the native module.
   */
  static async open(): Promise<LuxaforDevice> {
    const { HID } = await import("node-hid");
    return new LuxaforDevice(new HID(LUXAFOR_VENDOR_ID, LUXAFOR_PRODUCT_ID));
  }

  staticColor(color: Rgb): Promise<void> {
    return this.write(staticReport(color));
  }

  strobe(color: Rgb, speed: number, repeat: number): Promise<void> {
    return this.write(strobeReport(color, speed, repeat));
  }

  off(): Promise<void> {
    return this.staticColor([0, 0, 0]);
  }

  close(): Promise<void> {
    this.hid.close();
    return Promise.resolve();
  }

  private write(report: number[]): Promise<void> {
    const written = this.hid.write(report);
    if (written < 0) {
      return Promise.reject(new Error(`HID write failed (${written})`));
    }
    return Promise.resolve();
  }
}

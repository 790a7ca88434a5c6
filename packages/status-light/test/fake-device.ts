import type { LightDevice, Rgb } from "@deskwatch/status-light";

export type Command =
  | ["static", Rgb]
  | ["strobe", Rgb, number, number]
  | ["off"]
  | ["close"];

/** Records every command; `failing` makes the next commands throw. */
export class FakeLight implements LightDevice {
  readonly commands: Command[] = [];
  failing = false;

  private record(command: Command): Promise<void> {
    if (this.failing) return Promise.reject(new Error("device unplugged"));
    this.commands.push(command);
    return Promise.resolve();
  }

  staticColor(color: Rgb): Promise<void> {
    return this.record(["static", color]);
  }

  strobe(color: Rgb, speed: number, repeat: number): Promise<void> {
    return this.record(["strobe", color, speed, repeat]);
  }

  off(): Promise<void> {
    return this.record(["off"]);
  }

  close(): Promise<void> {
    this.commands.push(["close"]);
    return Promise.resolve();
  }
}

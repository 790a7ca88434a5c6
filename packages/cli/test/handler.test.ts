import { describe, expect, it } from "vitest";
import pc from "picocolors";
import { handleCommand, stringify } from "../lib/handler.ts";
import { captureContext } from "./helpers.ts";

describe("handleCommand", () => {
  it("prints strings as they are", async () => {
    const { context, stdout, codes } = captureContext();
    await handleCommand(Promise.resolve("Wrote 3 agents"), context);
    expect(stdout).toEqual(["Wrote 3 agents\n"]);
    expect(codes).toEqual([0]);
  });

  it("pretty-prints objects as JSON", async () => {
    const { context, stdout } = captureContext();
    await handleCommand({ id: 7, status: 2 }, context);
    expect(stdout).toEqual(['{\n  "id": 7,\n  "status": 2\n}\n']);
  });

  it("prints nothing for undefined", async () => {
    const { context, stdout, codes } = captureContext();
    await handleCommand(Promise.resolve(undefined), context);
    expect(stdout).toEqual([]);
    expect(codes).toEqual([0]);
  });

  it("prints failures in red and exits with 1", async () => {
    const { context, stdout, stderr, codes } = captureContext();
    await handleCommand(Promise.reject(new Error("No API key")), context);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([`${pc.red("No API key")}\n`]);
    expect(codes).toEqual([1]);
  });

  it("adds the stack when verbose", async () => {
    const { context, stderr } = captureContext();
    const error = new Error("boom");
    await handleCommand(Promise.reject(error), context, { verbose: true });
    expect(stderr).toHaveLength(2);
    expect(stderr[1]).toBe(`${pc.red(String(error.stack))}\n`);
  });
});

describe("stringify", () => {
  it("renders primitives and null", () => {
    expect(stringify(42)).toBe("42");
    expect(stringify(true)).toBe("true");
    expect(stringify(null)).toBe("null");
  });

  it("refuses functions", () => {
    expect(() => stringify(() => 1)).toThrow("Function could not be stringified");
  });
});

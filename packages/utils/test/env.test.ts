import { describe, expect, it } from "vitest";
import { z } from "zod";
import { envBoolean, envIntegerList, parseEnv } from "@deskwatch/utils/env";
import { ConfigError } from "@deskwatch/utils/errors";

const Schema = z.object({
  PORT: z.coerce.number().int().default(5001),
  VERBOSE: envBoolean(false),
  STATUS_IDS: envIntegerList("2,3"),
});

describe("parseEnv", () => {
  it("applies defaults", () => {
    expect(parseEnv(Schema, {})).toEqual({
      PORT: 5001,
      VERBOSE: false,
      STATUS_IDS: [2, 3],
    });
  });

  it("reads only the declared keys", () => {
    const env = parseEnv(Schema, {
      PORT: "8080",
      VERBOSE: "yes",
      STATUS_IDS: " 26, 9 ,",
      UNRELATED: "x",
    });
    expect(env).toEqual({ PORT: 8080, VERBOSE: true, STATUS_IDS: [26, 9] });
  });

  it("treats false-ish strings as false", () => {
    expect(parseEnv(Schema, { VERBOSE: "false" }).VERBOSE).toBe(false);
    expect(parseEnv(Schema, { VERBOSE: "0" }).VERBOSE).toBe(false);
    expect(parseEnv(Schema, { VERBOSE: "" }).VERBOSE).toBe(false);
  });

  it("reports every invalid variable in one error", () => {
    let caught: unknown;
    try {
      parseEnv(Schema, { PORT: "http", STATUS_IDS: "2,x" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      fields: {
        PORT: ["Expected number, received nan"],
        STATUS_IDS: ["expected comma separated integers, got '2,x'"],
      },
    });
  });
});

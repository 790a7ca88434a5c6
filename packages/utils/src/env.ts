import { z } from "zod";
import { ConfigError } from "./errors.ts";

export type EnvSource = Record<string, string | undefined>;

/**
 * `"true"`/`"1"`/`"yes"` and `"false"`/`"0"`/`"no"`; anything unset takes the
 * default.
 */
export function envBoolean(defaultValue: boolean) {
  return z
    .enum(["true", "false", "1", "0", "yes", "no", ""])
    .optional()
    .transform((value) =>
      value === undefined || value === ""
        ? defaultValue
        : value === "true" || value === "1" || value === "yes"
    );
}

/**
 * Comma separated integers, e.g. `STATUS_IDS=2,3,26`.
 */
export function envIntegerList(defaultValue: string) {
  return z
    .string()
    .default(defaultValue)
    .transform((value, ctx) => {
      const parts = value.split(",").map((part) => part.trim()).filter(Boolean);
      const numbers = parts.map(Number);
      if (numbers.some((n) => !Number.isInteger(n))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected comma separated integers, got '${value}'`,
        });
        return z.NEVER;
      }
      return numbers;
    });
}

/**
 * Parses the keys a schema declares out of `source`, throwing a
 * `ConfigError` that lists every invalid variable.
 */
export function parseEnv<T extends z.ZodRawShape>(
  schema: z.ZodObject<T>,
  source: EnvSource = process.env,
): z.infer<z.ZodObject<T>> {
  const raw: EnvSource = {};
  for (const key of Object.keys(schema.shape)) {
    raw[key] = source[key];
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    const fields: Record<string, string[]> = {};
    const fieldErrors: Record<string, string[] | undefined> =
      result.error.flatten().fieldErrors;
    for (const [key, messages] of Object.entries(fieldErrors)) {
      if (Array.isArray(messages)) fields[key] = messages;
    }
    const summary = Object.entries(fields)
      .map(([key, messages]) => `${key}: ${messages.join(", ")}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${summary}`, fields);
  }
  return result.data;
}

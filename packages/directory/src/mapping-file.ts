import { readFile, writeFile } from "node:fs/promises";
import { getLogger, type Logger } from "@deskwatch/utils/logger";
import { isMissing } from "@deskwatch/utils/types";
import type { NameSource } from "./directory.ts";

export interface ParsedMapping {
  mapping: Map<number, string>;
  /** One entry per skipped non-blank line. */
  problems: string[];
}

/**
 * Parses `id: name` lines. Blank lines are ignored; malformed lines are
 * skipped and reported.
 */
export function parseMappingFile(text: string): ParsedMapping {
  const mapping = new Map<number, string>();
  const problems: string[] = [];
  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    const lineNumber = index + 1;
    if (!line) return;
    const separator = line.indexOf(":");
    if (separator === -1) {
      problems.push(`line ${lineNumber}: missing ':' in '${line}'`);
      return;
    }
    const idText = line.slice(0, separator).trim();
    const name = line.slice(separator + 1).trim();
    if (!idText || !name) {
      problems.push(`line ${lineNumber}: empty id or name in '${line}'`);
      return;
    }
    if (!/^\d+$/.test(idText)) {
      problems.push(`line ${lineNumber}: id '${idText}' is not an integer`);
      return;
    }
    mapping.set(Number(idText), name);
  });
  return { mapping, problems };
}

export function formatMappingFile(mapping: ReadonlyMap<number, string>): string {
  return [...mapping.entries()]
    .sort(([a], [b]) => a - b)
    .map(([id, name]) => `${id}: ${name}\n`)
    .join("");
}

export async function writeMappingFile(
  path: string,
  mapping: ReadonlyMap<number, string>,
): Promise<void> {
  await writeFile(path, formatMappingFile(mapping), "utf-8");
}

/**
 * Names from a local `id: name` file. A missing file is a warning and an
 * empty mapping, never an error.
 */
export class MappingFileSource implements NameSource {
  readonly name: string;
  private readonly logger: Logger;

  constructor(readonly path: string, logger?: Logger) {
    this.name = `file:${path}`;
    this.logger = logger ?? getLogger("directory");
  }

  async load(): Promise<Map<number, string>> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (error) {
      if (isMissing(error)) {
        this.logger.warn(
          { path: this.path },
          "mapping file not found, names will default to ids",
        );
        return new Map();
      }
      throw error;
    }
    const { mapping, problems } = parseMappingFile(text);
    for (const problem of problems) {
      this.logger.warn({ path: this.path }, `skipped ${problem}`);
    }
    this.logger.info({ path: this.path, count: mapping.size }, "mapping loaded");
    return mapping;
  }
}

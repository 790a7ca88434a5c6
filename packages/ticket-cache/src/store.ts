import { mkdir, readdir, readFile, rename, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { format } from "date-fns";
import { type Ticket, TicketSchema } from "@deskwatch/freshservice";
import { getLogger, type Logger } from "@deskwatch/utils/logger";
import { errorMessage, isMissing, isObject } from "@deskwatch/utils/types";

const TICKET_FILE = /^(\d+)\.txt$/;

/**
 * A cache file that exists but could not be turned back into a ticket.
 */
export class CacheReadError extends Error {
  constructor(
    readonly id: number,
    readonly file: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CacheReadError";
  }
}

export interface ReadAllResult {
  tickets: Ticket[];
  errors: CacheReadError[];
}

export interface TicketStoreOptions {
  dir: string;
  /** Defaults to `<dir>/archive`. */
  archiveDir?: string;
  logger?: Logger;
}

/**
 * One pretty-printed JSON file per active ticket, named `<id>.txt`.
 *
 * The set of file names is the set of active ids as of the last successful
 * poll. Tickets that drop out are moved to `archive/<YYYY-MM-DD>/`, never
 * deleted.
 */
export class TicketStore {
  readonly dir: string;
  readonly archiveDir: string;
  private readonly logger: Logger;

  constructor(options: TicketStoreOptions) {
    this.dir = options.dir;
    this.archiveDir = options.archiveDir ?? join(options.dir, "archive");
    this.logger = options.logger ?? getLogger("ticket-cache");
  }

  fileFor(id: number): string {
    return join(this.dir, `${id}.txt`);
  }

  async ensureDirs(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await mkdir(this.archiveDir, { recursive: true });
  }

  async exists(): Promise<boolean> {
    try {
      return (await stat(this.dir)).isDirectory();
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  /**
   * Ids derived from the `<id>.txt` file names. A missing directory is an
   * empty cache.
   */
  async listIds(): Promise<Set<number>> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (error) {
      if (isMissing(error)) {
        this.logger.warn({ dir: this.dir }, "ticket directory does not exist");
        return new Set();
      }
      throw error;
    }
    const ids = new Set<number>();
    for (const name of names) {
      const match = TICKET_FILE.exec(name);
      if (match) ids.add(Number(match[1]));
    }
    return ids;
  }

  async write(ticket: Ticket): Promise<void> {
    await writeFile(
      this.fileFor(ticket.id),
      JSON.stringify(ticket, null, 4),
      "utf-8",
    );
  }

  /**
   * Reads one cached ticket. A missing file rejects with the `ENOENT` error
   * from the filesystem; a file that cannot be decoded with `CacheReadError`.
   */
  async read(id: number): Promise<Ticket> {
    const file = this.fileFor(id);
    const text = await readFile(file, "utf-8");
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new CacheReadError(
        id,
        file,
        `Could not decode ${file}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    // Older files may lack the id; the file name carries it.
    const candidate = isObject(raw) && !("id" in raw) ? { ...raw, id } : raw;
    const parsed = TicketSchema.safeParse(candidate);
    if (!parsed.success) {
      throw new CacheReadError(
        id,
        file,
        `Unexpected ticket shape in ${file}: ${parsed.error.issues[0]?.message}`,
      );
    }
    return parsed.data;
  }

  /**
   * Reads every cached ticket. Unreadable files are reported in `errors`
   * and left out of `tickets`; they never fail the whole read.
   */
  async readAll(): Promise<ReadAllResult> {
    const ids = [...await this.listIds()].sort((a, b) => a - b);
    const tickets: Ticket[] = [];
    const errors: CacheReadError[] = [];
    for (const id of ids) {
      try {
        tickets.push(await this.read(id));
      } catch (error) {
        if (error instanceof CacheReadError) {
          errors.push(error);
        } else if (isMissing(error)) {
          // Archived between listing and reading.
          continue;
        } else {
          errors.push(
            new CacheReadError(id, this.fileFor(id), errorMessage(error), {
              cause: error,
            }),
          );
        }
      }
    }
    return { tickets, errors };
  }

  /**
   * Moves `<id>.txt` into the archive folder for `date`.
   * @returns the destination path, or `null` if there was nothing to move
   */
  async archive(id: number, date: Date = new Date()): Promise<string | null> {
    const folder = join(this.archiveDir, format(date, "yyyy-MM-dd"));
    const source = this.fileFor(id);
    const destination = join(folder, `${id}.txt`);
    await mkdir(folder, { recursive: true });
    try {
      await rename(source, destination);
    } catch (error) {
      if (isMissing(error)) {
        this.logger.error({ ticket: id, source }, "archive source not found");
        return null;
      }
      throw error;
    }
    return destination;
  }
}

import type { NameLookup } from "@deskwatch/classifier";
import { getLogger, type Logger } from "@deskwatch/utils/logger";
import { errorMessage } from "@deskwatch/utils/types";

/**
 * Anything that can produce an id → display name table.
 */
export interface NameSource {
  readonly name: string;
  load(): Promise<Map<number, string>>;
}

export interface PeopleDirectoryOptions {
  agents?: NameSource;
  requesters?: NameSource;
  logger?: Logger;
}

/**
 * Agent and requester names for display. Purely cosmetic: unknown ids render
 * as placeholders and a failing source keeps the names it had before.
 */
export class PeopleDirectory implements NameLookup {
  private agentNames = new Map<number, string>();
  private requesterNames = new Map<number, string>();
  private readonly agentSource?: NameSource;
  private readonly requesterSource?: NameSource;
  private readonly logger: Logger;

  constructor(options: PeopleDirectoryOptions = {}) {
    this.agentSource = options.agents;
    this.requesterSource = options.requesters;
    this.logger = options.logger ?? getLogger("directory");
  }

  get isEmpty(): boolean {
    return this.agentNames.size === 0 && this.requesterNames.size === 0;
  }

  /** Reloads both tables from their sources. */
  async refresh(): Promise<void> {
    if (this.agentSource) {
      this.agentNames = await this.reload(this.agentSource, this.agentNames);
    }
    if (this.requesterSource) {
      this.requesterNames = await this.reload(
        this.requesterSource,
        this.requesterNames,
      );
    }
  }

  /** Refreshes only while nothing has been loaded yet. */
  async ensureLoaded(): Promise<void> {
    if (this.isEmpty) await this.refresh();
  }

  agents(): ReadonlyMap<number, string> {
    return this.agentNames;
  }

  agentName(id: number | null | undefined): string {
    if (id === null || id === undefined) return "Unassigned";
    return this.agentNames.get(id) ?? `Agent ID: ${id}`;
  }

  requesterName(id: number | null | undefined): string {
    if (id === null || id === undefined) return "N/A";
    return this.requesterNames.get(id) ?? `Req. ID: ${id}`;
  }

  private async reload(
    source: NameSource,
    previous: Map<number, string>,
  ): Promise<Map<number, string>> {
    try {
      return await source.load();
    } catch (error) {
      this.logger.warn(
        { source: source.name, err: errorMessage(error) },
        "could not refresh names, keeping previous table",
      );
      return previous;
    }
  }
}

/**
 * A fixed table, handy for tests and one-off scripts.
 */
export function staticNameSource(
  name: string,
  entries: Iterable<readonly [number, string]>,
): NameSource {
  const table = new Map(entries);
  return { name, load: () => Promise.resolve(new Map(table)) };
}

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  formatMappingFile,
  FreshserviceNameSource,
  MappingFileSource,
  parseMappingFile,
  writeMappingFile,
} from "@deskwatch/directory";

describe("parseMappingFile", () => {
  it("reads id: name lines and trims both sides", () => {
    const { mapping, problems } = parseMappingFile(
      "12: Grace Hopper\n\n  34 :  Alan Turing  \r\n",
    );
    expect([...mapping.entries()]).toEqual([
      [12, "Grace Hopper"],
      [34, "Alan Turing"],
    ]);
    expect(problems).toEqual([]);
  });

  it("keeps colons inside names", () => {
    const { mapping } = parseMappingFile("5: Team: Networking");
    expect(mapping.get(5)).toBe("Team: Networking");
  });

  it("reports malformed lines and keeps going", () => {
    const { mapping, problems } = parseMappingFile(
      "no separator\nabc: Someone\n9:\n10: Valid",
    );
    expect([...mapping.entries()]).toEqual([[10, "Valid"]]);
    expect(problems).toEqual([
      "line 1: missing ':' in 'no separator'",
      "line 2: id 'abc' is not an integer",
      "line 3: empty id or name in '9:'",
    ]);
  });
});

describe("formatMappingFile", () => {
  it("writes sorted id: name lines", () => {
    const text = formatMappingFile(new Map([[20, "B"], [3, "A"]]));
    expect(text).toBe("3: A\n20: B\n");
  });
});

describe("MappingFileSource", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "deskwatch-directory-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads a written mapping back", async () => {
    const path = join(dir, "agents.txt");
    await writeMappingFile(path, new Map([[1, "Ada"], [2, "Grace"]]));
    expect(await readFile(path, "utf-8")).toBe("1: Ada\n2: Grace\n");

    const mapping = await new MappingFileSource(path).load();
    expect(mapping.get(2)).toBe("Grace");
  });

  it("treats a missing file as empty", async () => {
    const mapping = await new MappingFileSource(join(dir, "nope.txt")).load();
    expect(mapping.size).toBe(0);
  });

  it("skips bad lines", async () => {
    const path = join(dir, "requesters.txt");
    await writeFile(path, "x\n4: Dana\n");
    const mapping = await new MappingFileSource(path).load();
    expect([...mapping.entries()]).toEqual([[4, "Dana"]]);
  });
});

describe("FreshserviceNameSource", () => {
  it("builds display names from people records", async () => {
    const client = {
      listAgents: () =>
        Promise.resolve([
          { id: 1, first_name: "Ada", last_name: "Lovelace" },
          { id: 2, first_name: null, last_name: null, email: "ops@example.com" },
        ]),
      listRequesters: () => Promise.resolve([]),
    };
    const mapping = await new FreshserviceNameSource(client, "agents").load();
    expect([...mapping.entries()]).toEqual([
      [1, "Ada Lovelace"],
      [2, "ops@example.com"],
    ]);
  });
});

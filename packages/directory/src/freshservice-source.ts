import {
  type FreshserviceClient,
  type Person,
  personDisplayName,
} from "@deskwatch/freshservice";
import type { NameSource } from "./directory.ts";

type PeopleKind = "agents" | "requesters";

/**
 * Names fetched live from the Freshservice agents or requesters endpoint.
 */
export class FreshserviceNameSource implements NameSource {
  readonly name: string;

  constructor(
    private readonly client: Pick<
      FreshserviceClient,
      "listAgents" | "listRequesters"
    >,
    private readonly kind: PeopleKind,
  ) {
    this.name = `freshservice:${kind}`;
  }

  async load(): Promise<Map<number, string>> {
    const people = this.kind === "agents"
      ? await this.client.listAgents()
      : await this.client.listRequesters();
    return peopleToMapping(people);
  }
}

export function peopleToMapping(people: readonly Person[]): Map<number, string> {
  return new Map(
    people.map((person) => [person.id, personDisplayName(person)] as const),
  );
}

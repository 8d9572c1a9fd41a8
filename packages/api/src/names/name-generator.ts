import { readFileSync } from "node:fs";
import { z } from "zod";
import type { RandomSource } from "@graphsim/simulation";

const nameListsSchema = z.object({
  first: z.array(z.string().min(1)).min(1),
  last: z.array(z.string().min(1)).min(1),
});

export type NameLists = z.infer<typeof nameListsSchema>;

let defaultLists: NameLists | null = null;

export function loadNameLists(): NameLists {
  if (!defaultLists) {
    const text = readFileSync(new URL("./names.json", import.meta.url), "utf8");
    defaultLists = nameListsSchema.parse(JSON.parse(text));
  }
  return defaultLists;
}

/** Display names ("First Last"); duplicates are allowed. */
export class NameGenerator {
  private readonly lists: NameLists;

  constructor(
    private readonly random: RandomSource,
    lists?: NameLists,
  ) {
    this.lists = lists ? nameListsSchema.parse(lists) : loadNameLists();
  }

  next(): string {
    return `${this.random.choice(this.lists.first)} ${this.random.choice(this.lists.last)}`;
  }

  generate(count: number): string[] {
    return Array.from({ length: count }, () => this.next());
  }
}

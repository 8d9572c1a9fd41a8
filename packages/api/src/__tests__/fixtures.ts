import { GENERATOR_SMALL, type GeneratorConfig } from "@graphsim/simulation";
import type { StoredEvent } from "../event-store/types.js";

/** Small preset shrunk so a full run stays fast. */
export function tinyConfig(dayCount = 5): GeneratorConfig {
  return {
    ...GENERATOR_SMALL,
    graph: { ...GENERATOR_SMALL.graph, nodeCount: 40 },
    timeline: { ...GENERATOR_SMALL.timeline, dayCount },
    transitions: { ...GENERATOR_SMALL.transitions, newConnection: 0.1 },
  };
}

export function makeEvent(overrides: Partial<Omit<StoredEvent, "id">> = {}): Omit<StoredEvent, "id"> {
  return {
    day: 1,
    date: "2024-01-02T00:00:00.000Z",
    sourceId: 0,
    targetId: 1,
    eventCode: "NEW_CONNECTION",
    relationBefore: "none",
    relationAfter: "fan",
    ...overrides,
  };
}

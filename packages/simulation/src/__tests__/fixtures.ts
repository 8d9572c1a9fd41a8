import { GENERATOR_SMALL, type GeneratorConfig } from "../config.js";
import { SocialGraph } from "../graph/social-graph.js";

type Overrides = { [K in keyof GeneratorConfig]?: Partial<GeneratorConfig[K]> };

/** Small preset with every daily dynamic switched off unless overridden. */
export function quietConfig(overrides: Overrides = {}): GeneratorConfig {
  const base = GENERATOR_SMALL;
  return {
    preset: base.preset,
    graph: { ...base.graph, ...overrides.graph },
    connection: { ...base.connection, ...overrides.connection },
    distance: { ...base.distance, ...overrides.distance },
    timeline: { ...base.timeline, ...overrides.timeline },
    messages: { ...base.messages, dailyProbability: 0, ...overrides.messages },
    transitions: {
      friendToFan: 0,
      fanToFriend: 0,
      newConnection: 0,
      breakConnection: 0,
      ...overrides.transitions,
    },
    popularity: {
      viralNodeCount: 0,
      viralGainFans: 0,
      viralLoseFans: 0,
      normalGainFans: 0,
      normalLoseFans: 0,
      ...overrides.popularity,
    },
  };
}

export const START = new Date("2024-01-01T00:00:00Z");

/** Graph of `count` bare nodes in region 0 with no interests. */
export function makeGraph(count: number, edges: [number, number][] = []): SocialGraph {
  const graph = new SocialGraph();
  for (let i = 0; i < count; i++) {
    graph.addNode({ latitude: 0, longitude: 0, regionId: 0, interests: new Set(), createdAt: START });
  }
  for (const [s, t] of edges) graph.addEdge(s, t, START);
  return graph;
}

import { describe, it, expect } from "vitest";
import { GraphBuilder, addDays } from "../systems/graph-builder.js";
import { SeededRandom } from "../random.js";
import { toEdgeRecords } from "../snapshot.js";
import { ConfigurationError } from "../errors.js";
import { quietConfig, START } from "./fixtures.js";

describe("GraphBuilder", () => {
  it("generates nodes with bounded interests and creation dates", () => {
    const config = quietConfig({
      graph: { nodeCount: 60, minInterestsPerUser: 2, maxInterestsPerUser: 4 },
      timeline: { accountCreationStartDaysBefore: 30, accountCreationEndDaysBefore: 5 },
    });
    const builder = new GraphBuilder(config, new SeededRandom(1));
    builder.generateNodes();

    const nodes = builder.graph.getAllNodes();
    expect(nodes).toHaveLength(60);
    for (const node of nodes) {
      expect(node.interests.size).toBeGreaterThanOrEqual(2);
      expect(node.interests.size).toBeLessThanOrEqual(4);
      expect(node.createdAt.getTime()).toBeGreaterThanOrEqual(addDays(START, -30).getTime());
      expect(node.createdAt.getTime()).toBeLessThanOrEqual(addDays(START, -5).getTime());
      expect(node.regionId).toBeLessThan(config.graph.regionCount);
    }
  });

  it("honors an explicit node count", () => {
    const builder = new GraphBuilder(quietConfig(), new SeededRandom(1));
    builder.generateNodes(7);
    expect(builder.graph.nodeCount).toBe(7);
  });

  it("creates no edges when every probability is zero", () => {
    const config = quietConfig({
      graph: { nodeCount: 20 },
      connection: { baseProbability: 0, geographicBoost: 0, maxInterestBoost: 0 },
    });
    const graph = new GraphBuilder(config, new SeededRandom(4)).build();
    expect(graph.edgeCount).toBe(0);
  });

  it("stamps generated edges with the start date and empty activity", () => {
    const config = quietConfig({
      graph: { nodeCount: 15 },
      connection: { baseProbability: 1 },
    });
    const graph = new GraphBuilder(config, new SeededRandom(9)).build();
    expect(graph.edgeCount).toBeGreaterThan(0);
    for (const edge of graph.getAllEdges()) {
      expect(edge.sourceId).not.toBe(edge.targetId);
      expect(edge.establishedAt.getTime()).toBe(START.getTime());
      expect(edge.messageCount).toBe(0);
      expect(edge.lastInteraction).toBeNull();
    }
  });

  it("never produces duplicate ordered pairs", () => {
    const config = quietConfig({ graph: { nodeCount: 40 }, connection: { baseProbability: 0.5 } });
    const graph = new GraphBuilder(config, new SeededRandom(12)).build();
    const keys = graph.getAllEdges().map((e) => `${e.sourceId}->${e.targetId}`);
    expect(new Set(keys).size).toBe(keys.length);
    expect(keys.length).toBe(graph.edgeCount);
  });

  it("is reproducible for a fixed seed", () => {
    const config = quietConfig({ graph: { nodeCount: 30 } });
    const a = new GraphBuilder(config, new SeededRandom("same")).build();
    const b = new GraphBuilder(config, new SeededRandom("same")).build();
    expect(toEdgeRecords(a)).toEqual(toEdgeRecords(b));
    expect(a.getAllNodes().map((n) => n.latitude)).toEqual(b.getAllNodes().map((n) => n.latitude));
  });

  it("favors same-region pairs", () => {
    const config = quietConfig({
      graph: { nodeCount: 120, regionCount: 4 },
      connection: { baseProbability: 0.01, geographicBoost: 0.4, maxInterestBoost: 0 },
    });
    const graph = new GraphBuilder(config, new SeededRandom(21)).build();
    let sameRegion = 0;
    for (const edge of graph.getAllEdges()) {
      const s = graph.getNode(edge.sourceId);
      const t = graph.getNode(edge.targetId);
      if (s?.regionId === t?.regionId) sameRegion++;
    }
    expect(sameRegion / graph.edgeCount).toBeGreaterThan(0.5);
  });

  it("rejects an invalid configuration before generating anything", () => {
    const config = quietConfig({ graph: { minInterestsPerUser: 5, maxInterestsPerUser: 2 } });
    expect(() => new GraphBuilder(config, new SeededRandom(1))).toThrow(ConfigurationError);
    expect(() => new GraphBuilder(config, new SeededRandom(1))).toThrow(
      "graph.minInterestsPerUser: must not exceed maxInterestsPerUser",
    );
  });
});

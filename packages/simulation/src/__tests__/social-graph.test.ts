import { describe, it, expect } from "vitest";
import { SocialGraph } from "../graph/social-graph.js";
import { GraphInvariantError } from "../errors.js";
import { makeGraph, START } from "./fixtures.js";

describe("SocialGraph", () => {
  it("assigns dense ids to nodes", () => {
    const graph = makeGraph(3);
    expect(graph.nodeCount).toBe(3);
    expect(graph.getAllNodes().map((n) => n.id)).toEqual([0, 1, 2]);
    expect(graph.getNode(1)?.regionId).toBe(0);
    expect(graph.getNode(7)).toBeUndefined();
  });

  it("adds edges with initial attributes", () => {
    const graph = makeGraph(2);
    expect(graph.addEdge(0, 1, START)).toBe(true);
    const edge = graph.getEdge(0, 1);
    expect(edge).toMatchObject({
      sourceId: 0,
      targetId: 1,
      messageCount: 0,
      lastInteraction: null,
      establishedAt: START,
    });
    expect(graph.hasEdge(1, 0)).toBe(false);
  });

  it("treats duplicate additions as no-ops", () => {
    const graph = makeGraph(2);
    graph.addEdge(0, 1, START);
    graph.getEdge(0, 1)!.messageCount = 12;
    expect(graph.addEdge(0, 1, new Date("2024-02-01T00:00:00Z"))).toBe(false);
    expect(graph.edgeCount).toBe(1);
    expect(graph.getEdge(0, 1)?.messageCount).toBe(12);
  });

  it("rejects self-loops and unknown nodes", () => {
    const graph = makeGraph(2);
    expect(() => graph.addEdge(1, 1, START)).toThrow(GraphInvariantError);
    expect(() => graph.addEdge(0, 5, START)).toThrow(GraphInvariantError);
  });

  it("keeps adjacency in step with edges", () => {
    const graph = makeGraph(3, [[0, 1], [2, 1], [1, 0]]);
    expect([...graph.predecessors(1)].sort()).toEqual([0, 2]);
    expect([...graph.successors(1)]).toEqual([0]);
    expect(graph.inDegree(1)).toBe(2);
    expect(graph.outDegree(2)).toBe(1);

    expect(graph.removeEdge(2, 1)).toBe(true);
    expect(graph.removeEdge(2, 1)).toBe(false);
    expect([...graph.predecessors(1)]).toEqual([0]);
    expect(graph.edgeCount).toBe(2);
  });

  it("returns empty adjacency for unknown nodes", () => {
    const graph = new SocialGraph();
    expect(graph.successors(4).size).toBe(0);
    expect(graph.predecessors(4).size).toBe(0);
  });

  it("returns an edge list that is safe to mutate against", () => {
    const graph = makeGraph(3, [[0, 1], [1, 2], [2, 0]]);
    for (const edge of graph.getAllEdges()) {
      graph.removeEdge(edge.sourceId, edge.targetId);
    }
    expect(graph.edgeCount).toBe(0);
  });
});

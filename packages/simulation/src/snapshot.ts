import type { SocialGraph } from "./graph/social-graph.js";
import type { EdgeRecord, GraphSummary, NodeRecord } from "./graph/types.js";

export function toNodeRecords(graph: SocialGraph): NodeRecord[] {
  return graph.getAllNodes().map((node) => ({
    id: node.id,
    latitude: node.latitude,
    longitude: node.longitude,
    regionId: node.regionId,
    interests: [...node.interests],
    createdAt: node.createdAt.toISOString(),
  }));
}

export function toEdgeRecords(graph: SocialGraph): EdgeRecord[] {
  return graph.getAllEdges().map((edge) => ({
    sourceId: edge.sourceId,
    targetId: edge.targetId,
    relationshipType: edge.relationshipType,
    messageCount: edge.messageCount,
    lastInteraction: edge.lastInteraction?.toISOString() ?? null,
    distance: edge.distance,
    establishedAt: edge.establishedAt.toISOString(),
  }));
}

/** Counts derive from edge existence, not from the cached relationshipType. */
export function summarize(graph: SocialGraph, date: Date): GraphSummary {
  let friendEdges = 0;
  let fanEdges = 0;
  for (const edge of graph.getAllEdges()) {
    if (graph.hasEdge(edge.targetId, edge.sourceId)) friendEdges++;
    else fanEdges++;
  }

  const totalNodes = graph.nodeCount;
  const totalEdges = graph.edgeCount;

  return {
    date: date.toISOString(),
    totalNodes,
    totalEdges,
    friendRelationships: friendEdges / 2,
    fanRelationships: fanEdges,
    // every edge adds one to an in-degree and one to an out-degree
    averageDegree: totalNodes > 0 ? (2 * totalEdges) / totalNodes : 0,
  };
}

import type { GeneratorConfig } from "../config.js";
import type { SocialGraph } from "../graph/social-graph.js";
import type { NodeId, PairRelation } from "../graph/types.js";

// Message volume at which the message term of distance saturates
const MESSAGE_SATURATION = 1000;
const MESSAGE_SCALE = 10;

/**
 * Friend/fan classification and closeness scoring. Holds no graph state of
 * its own; every answer is derived from current edge existence.
 */
export class RelationshipEngine {
  constructor(
    private readonly graph: SocialGraph,
    private readonly distanceConfig: GeneratorConfig["distance"],
  ) {}

  relationshipType(a: NodeId, b: NodeId): PairRelation {
    const forward = this.graph.hasEdge(a, b);
    const backward = this.graph.hasEdge(b, a);
    if (forward && backward) return "friend";
    if (forward || backward) return "fan";
    return "none";
  }

  /** Nodes both a and b follow that also follow both of them back. */
  mutualFriends(a: NodeId, b: NodeId): Set<NodeId> {
    const mutual = new Set<NodeId>();
    if (!this.graph.hasNode(a) || !this.graph.hasNode(b)) return mutual;

    const followedByB = this.graph.successors(b);
    for (const candidate of this.graph.successors(a)) {
      if (!followedByB.has(candidate)) continue;
      if (this.graph.hasEdge(candidate, a) && this.graph.hasEdge(candidate, b)) {
        mutual.add(candidate);
      }
    }
    return mutual;
  }

  distance(a: NodeId, b: NodeId, relation: PairRelation): number {
    const cfg = this.distanceConfig;
    let base: number;
    if (relation === "friend") base = cfg.friendBase;
    else if (relation === "fan") base = cfg.fanBase;
    else return Number.POSITIVE_INFINITY;

    const mutualCount = this.mutualFriends(a, b).size;
    const edge = this.graph.getEdge(a, b) ?? this.graph.getEdge(b, a);
    const messageFrequency = Math.min((edge?.messageCount ?? 0) / MESSAGE_SATURATION, 1.0);

    const distance =
      base -
      mutualCount * cfg.mutualFriendWeight -
      messageFrequency * cfg.messageFrequencyWeight * MESSAGE_SCALE;

    return Math.max(cfg.minimum, distance);
  }

  updateRelationshipTypes(): void {
    for (const edge of this.graph.getAllEdges()) {
      const relation = this.relationshipType(edge.sourceId, edge.targetId);
      if (relation !== "none") edge.relationshipType = relation;
    }
  }

  /** One computation per unordered pair, written to every edge between them. */
  updateAllDistances(): void {
    const seen = new Set<string>();

    for (const edge of this.graph.getAllEdges()) {
      const a = Math.min(edge.sourceId, edge.targetId);
      const b = Math.max(edge.sourceId, edge.targetId);
      const key = `${a}:${b}`;
      if (seen.has(key)) continue;
      seen.add(key);

      const relation = this.relationshipType(a, b);
      if (relation === "none") continue;

      const distance = this.distance(a, b, relation);
      const forward = this.graph.getEdge(a, b);
      const backward = this.graph.getEdge(b, a);
      if (forward) forward.distance = distance;
      if (backward) backward.distance = distance;
    }
  }

  /** Types first: distance depends on the current classification. */
  refresh(): void {
    this.updateRelationshipTypes();
    this.updateAllDistances();
  }
}

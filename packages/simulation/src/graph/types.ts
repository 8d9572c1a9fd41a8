export type NodeId = number;

export type RelationshipType = "friend" | "fan";

/** Classification of an unordered pair; "none" when neither edge exists. */
export type PairRelation = RelationshipType | "none";

export interface UserNode {
  readonly id: NodeId;
  latitude: number;
  longitude: number;
  regionId: number;
  interests: ReadonlySet<string>;
  createdAt: Date;
}

export interface FollowEdge {
  readonly sourceId: NodeId;
  readonly targetId: NodeId;
  messageCount: number;
  lastInteraction: Date | null;
  establishedAt: Date;
  // Derived caches, rewritten by RelationshipEngine after each mutating step
  relationshipType: RelationshipType;
  distance: number;
}

export interface NodeRecord {
  id: NodeId;
  latitude: number;
  longitude: number;
  regionId: number;
  interests: string[];
  createdAt: string;
}

export interface EdgeRecord {
  sourceId: NodeId;
  targetId: NodeId;
  relationshipType: RelationshipType;
  messageCount: number;
  lastInteraction: string | null;
  distance: number;
  establishedAt: string;
}

export interface GraphSummary {
  date: string;
  totalNodes: number;
  totalEdges: number;
  friendRelationships: number; // unordered pairs
  fanRelationships: number; // one-way edges
  averageDegree: number;
}

export interface UserRecord {
  id: number;
  name?: string;
  latitude: number;
  longitude: number;
  regionId: number;
  interests: string[];
  createdAt: string;
}

export type FollowType = "friend" | "fan";

export interface FollowRecord {
  sourceId: number;
  targetId: number;
  relationshipType: FollowType;
  messageCount: number;
  lastInteraction: string | null;
  distance: number;
  establishedAt: string;
}

export interface SnapshotMetadata {
  date: string;
  totalNodes: number;
  totalEdges: number;
  friendRelationships: number;
  fanRelationships: number;
  averageDegree: number;
}

export interface DailySnapshot {
  date: string;
  users: UserRecord[];
  follows: FollowRecord[];
  metadata: SnapshotMetadata;
}

/** Calendar day of an ISO timestamp, used to key snapshots. */
export function snapshotDay(date: string): string {
  return date.slice(0, 10);
}

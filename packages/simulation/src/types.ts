import type { GraphSummary, NodeId, PairRelation } from "./graph/types.js";

export type FollowEventCode =
  | "UNFOLLOW" // friend pair loses one direction
  | "FOLLOW_BACK" // fan pair becomes mutual
  | "CONNECTION_BROKEN"
  | "NEW_CONNECTION"
  | "FAN_GAINED"
  | "FAN_LOST";

export interface SimulationEvent {
  day: number;
  date: string;
  sourceId: NodeId;
  targetId: NodeId;
  eventCode: FollowEventCode;
  relationBefore: PairRelation;
  relationAfter: PairRelation;
}

export interface DayReport {
  day: number;
  date: string;
  events: SimulationEvent[];
  messagesSent: number;
  summary: GraphSummary;
}

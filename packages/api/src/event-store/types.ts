import type { FollowEventCode, PairRelation } from "@graphsim/simulation";

export interface StoredEvent {
  id: number;
  day: number;
  date: string;
  sourceId: number;
  targetId: number;
  eventCode: FollowEventCode;
  relationBefore: PairRelation;
  relationAfter: PairRelation;
}

export interface IEventStore {
  append(events: Omit<StoredEvent, "id">[]): void;
  getByUser(userId: number, fromDay?: number, toDay?: number): StoredEvent[];
  getByPair(a: number, b: number, fromDay?: number, toDay?: number): StoredEvent[];
  getByDayRange(fromDay: number, toDay: number): StoredEvent[];
  countByCode(fromDay?: number, toDay?: number): Partial<Record<FollowEventCode, number>>;
  getAll(): StoredEvent[];
  close(): void;
}

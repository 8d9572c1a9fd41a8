import type { DailySnapshot, SnapshotMetadata } from "./graph.js";

/**
 * Abstract interface for snapshot persistence.
 * Implementations: InMemorySnapshotRepository (tests/API), FileSnapshotRepository
 * (JSON + CSV export), Neo4jSnapshotRepository.
 *
 * Dates are calendar days (YYYY-MM-DD); a later save for the same day replaces
 * the earlier one.
 */
export interface ISnapshotRepository {
  saveSnapshot(snapshot: DailySnapshot): Promise<void>;
  getSnapshot(date: string): Promise<DailySnapshot | null>;
  getMetadata(date: string): Promise<SnapshotMetadata | null>;
  listSnapshotDates(): Promise<string[]>;

  // Lifecycle
  connect(): Promise<void>;
  disconnect(): Promise<void>;
}

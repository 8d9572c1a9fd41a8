import type { ISnapshotRepository } from "../types/repository.js";
import { snapshotDay, type DailySnapshot, type SnapshotMetadata } from "../types/graph.js";

function cloneSnapshot(snapshot: DailySnapshot): DailySnapshot {
  return {
    date: snapshot.date,
    users: snapshot.users.map((u) => ({ ...u, interests: [...u.interests] })),
    follows: snapshot.follows.map((f) => ({ ...f })),
    metadata: { ...snapshot.metadata },
  };
}

export class InMemorySnapshotRepository implements ISnapshotRepository {
  private snapshots = new Map<string, DailySnapshot>(); // key: YYYY-MM-DD

  async connect(): Promise<void> {
    // no-op for in-memory
  }

  async disconnect(): Promise<void> {
    this.snapshots.clear();
  }

  async saveSnapshot(snapshot: DailySnapshot): Promise<void> {
    this.snapshots.set(snapshotDay(snapshot.date), cloneSnapshot(snapshot));
  }

  async getSnapshot(date: string): Promise<DailySnapshot | null> {
    const snapshot = this.snapshots.get(snapshotDay(date));
    return snapshot ? cloneSnapshot(snapshot) : null;
  }

  async getMetadata(date: string): Promise<SnapshotMetadata | null> {
    const snapshot = this.snapshots.get(snapshotDay(date));
    return snapshot ? { ...snapshot.metadata } : null;
  }

  async listSnapshotDates(): Promise<string[]> {
    return [...this.snapshots.keys()].sort();
  }
}

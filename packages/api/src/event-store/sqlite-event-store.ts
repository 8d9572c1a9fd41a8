import Database from "better-sqlite3";
import { z } from "zod";
import type { IEventStore, StoredEvent } from "./types.js";

const eventCodeSchema = z.enum([
  "UNFOLLOW",
  "FOLLOW_BACK",
  "CONNECTION_BROKEN",
  "NEW_CONNECTION",
  "FAN_GAINED",
  "FAN_LOST",
]);
const relationSchema = z.enum(["none", "fan", "friend"]);

const eventRowSchema = z.object({
  id: z.number(),
  day: z.number(),
  date: z.string(),
  source_id: z.number(),
  target_id: z.number(),
  event_code: eventCodeSchema,
  relation_before: relationSchema,
  relation_after: relationSchema,
});

const countRowSchema = z.object({ event_code: eventCodeSchema, total: z.number() });

export class SqliteEventStore implements IEventStore {
  private db: Database.Database;

  constructor(dbPath: string = ":memory:") {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        day INTEGER NOT NULL,
        date TEXT NOT NULL,
        source_id INTEGER NOT NULL,
        target_id INTEGER NOT NULL,
        event_code TEXT NOT NULL,
        relation_before TEXT NOT NULL,
        relation_after TEXT NOT NULL
      )
    `);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_events_day ON events(day)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_events_source ON events(source_id)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_events_target ON events(target_id)`);
  }

  append(events: Omit<StoredEvent, "id">[]): void {
    const stmt = this.db.prepare(`
      INSERT INTO events (day, date, source_id, target_id, event_code, relation_before, relation_after)
      VALUES (@day, @date, @sourceId, @targetId, @eventCode, @relationBefore, @relationAfter)
    `);

    const insertMany = this.db.transaction((evts: Omit<StoredEvent, "id">[]) => {
      for (const e of evts) stmt.run(e);
    });

    insertMany(events);
  }

  getByUser(userId: number, fromDay?: number, toDay?: number): StoredEvent[] {
    const where = withDayRange(`(source_id = ? OR target_id = ?)`, [userId, userId], fromDay, toDay);
    return this.select(where.sql, where.params);
  }

  getByPair(a: number, b: number, fromDay?: number, toDay?: number): StoredEvent[] {
    const where = withDayRange(
      `((source_id = ? AND target_id = ?) OR (source_id = ? AND target_id = ?))`,
      [a, b, b, a],
      fromDay,
      toDay,
    );
    return this.select(where.sql, where.params);
  }

  getByDayRange(fromDay: number, toDay: number): StoredEvent[] {
    return this.select(`day >= ? AND day <= ?`, [fromDay, toDay]);
  }

  countByCode(fromDay?: number, toDay?: number): Partial<Record<StoredEvent["eventCode"], number>> {
    const where = withDayRange(`1 = 1`, [], fromDay, toDay);
    const rows = this.db
      .prepare(`SELECT event_code, COUNT(*) AS total FROM events WHERE ${where.sql} GROUP BY event_code`)
      .all(...where.params);

    const counts: Partial<Record<StoredEvent["eventCode"], number>> = {};
    for (const row of rows) {
      const { event_code, total } = countRowSchema.parse(row);
      counts[event_code] = total;
    }
    return counts;
  }

  getAll(): StoredEvent[] {
    return this.select(`1 = 1`, []);
  }

  close(): void {
    this.db.close();
  }

  private select(where: string, params: number[]): StoredEvent[] {
    return this.db
      .prepare(`SELECT * FROM events WHERE ${where} ORDER BY day ASC, id ASC`)
      .all(...params)
      .map(rowToEvent);
  }
}

function withDayRange(
  sql: string,
  params: number[],
  fromDay?: number,
  toDay?: number,
): { sql: string; params: number[] } {
  let clause = sql;
  const values = [...params];
  if (fromDay !== undefined) {
    clause += ` AND day >= ?`;
    values.push(fromDay);
  }
  if (toDay !== undefined) {
    clause += ` AND day <= ?`;
    values.push(toDay);
  }
  return { sql: clause, params: values };
}

function rowToEvent(row: unknown): StoredEvent {
  const r = eventRowSchema.parse(row);
  return {
    id: r.id,
    day: r.day,
    date: r.date,
    sourceId: r.source_id,
    targetId: r.target_id,
    eventCode: r.event_code,
    relationBefore: r.relation_before,
    relationAfter: r.relation_after,
  };
}

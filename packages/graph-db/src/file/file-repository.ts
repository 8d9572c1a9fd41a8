import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { ISnapshotRepository } from "../types/repository.js";
import {
  snapshotDay,
  type DailySnapshot,
  type FollowRecord,
  type SnapshotMetadata,
  type UserRecord,
} from "../types/graph.js";

// On-disk rows use snake_case keys, one directory per day:
//   <outputDir>/<YYYY-MM-DD>/{nodes,edges,metadata}.json
// plus nodes.csv / edges_daily.csv across all days, written on disconnect.

const nodeRowSchema = z.object({
  user_id: z.number(),
  name: z.string().optional(),
  location: z.tuple([z.number(), z.number()]),
  region_id: z.number(),
  interests: z.array(z.string()),
  created_at: z.string(),
});

const edgeRowSchema = z.object({
  source: z.number(),
  target: z.number(),
  relationship_type: z.enum(["friend", "fan"]),
  message_count: z.number(),
  last_interaction: z.string().nullable(),
  distance: z.number(),
  established_at: z.string(),
});

const metadataRowSchema = z.object({
  date: z.string(),
  total_nodes: z.number(),
  total_edges: z.number(),
  friend_relationships: z.number(),
  fan_relationships: z.number(),
  average_degree: z.number(),
});

type NodeRow = z.infer<typeof nodeRowSchema>;
type EdgeRow = z.infer<typeof edgeRowSchema>;
type MetadataRow = z.infer<typeof metadataRowSchema>;

const NODE_CSV_COLUMNS = [
  "user_id", "name", "date", "location_lat", "location_lon", "region_id", "interests", "created_at",
];
const EDGE_CSV_COLUMNS = [
  "date", "source", "target", "relationship_type", "message_count", "last_interaction", "distance", "established_at",
];

const DAY_DIR = /^\d{4}-\d{2}-\d{2}$/;

function toNodeRow(user: UserRecord): NodeRow {
  return {
    user_id: user.id,
    ...(user.name !== undefined ? { name: user.name } : {}),
    location: [user.latitude, user.longitude],
    region_id: user.regionId,
    interests: user.interests,
    created_at: user.createdAt,
  };
}

function fromNodeRow(row: NodeRow): UserRecord {
  return {
    id: row.user_id,
    ...(row.name !== undefined ? { name: row.name } : {}),
    latitude: row.location[0],
    longitude: row.location[1],
    regionId: row.region_id,
    interests: row.interests,
    createdAt: row.created_at,
  };
}

function toEdgeRow(follow: FollowRecord): EdgeRow {
  return {
    source: follow.sourceId,
    target: follow.targetId,
    relationship_type: follow.relationshipType,
    message_count: follow.messageCount,
    last_interaction: follow.lastInteraction,
    distance: follow.distance,
    established_at: follow.establishedAt,
  };
}

function fromEdgeRow(row: EdgeRow): FollowRecord {
  return {
    sourceId: row.source,
    targetId: row.target,
    relationshipType: row.relationship_type,
    messageCount: row.message_count,
    lastInteraction: row.last_interaction,
    distance: row.distance,
    establishedAt: row.established_at,
  };
}

function toMetadataRow(metadata: SnapshotMetadata): MetadataRow {
  return {
    date: metadata.date,
    total_nodes: metadata.totalNodes,
    total_edges: metadata.totalEdges,
    friend_relationships: metadata.friendRelationships,
    fan_relationships: metadata.fanRelationships,
    average_degree: metadata.averageDegree,
  };
}

function fromMetadataRow(row: MetadataRow): SnapshotMetadata {
  return {
    date: row.date,
    totalNodes: row.total_nodes,
    totalEdges: row.total_edges,
    friendRelationships: row.friend_relationships,
    fanRelationships: row.fan_relationships,
    averageDegree: row.average_degree,
  };
}

export function csvField(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function csvLine(values: (string | number | null | undefined)[]): string {
  return values.map(csvField).join(",");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export interface FileRepositoryOptions {
  outputDir: string;
  /** Write nodes.csv / edges_daily.csv on disconnect (default true). */
  aggregateCsv?: boolean;
}

export class FileSnapshotRepository implements ISnapshotRepository {
  private readonly outputDir: string;
  private readonly aggregateCsv: boolean;
  private connected = false;
  private nodeLines = new Map<string, string[]>(); // key: YYYY-MM-DD
  private edgeLines = new Map<string, string[]>();

  constructor(options: FileRepositoryOptions) {
    this.outputDir = options.outputDir;
    this.aggregateCsv = options.aggregateCsv ?? true;
  }

  async connect(): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    if (this.aggregateCsv && this.nodeLines.size > 0) {
      await this.writeAggregatedCsv();
    }
    this.nodeLines.clear();
    this.edgeLines.clear();
    this.connected = false;
  }

  private ensureConnected(): void {
    if (!this.connected) throw new Error("Not connected. Call connect() first.");
  }

  private dayDir(date: string): string {
    return path.join(this.outputDir, snapshotDay(date));
  }

  async saveSnapshot(snapshot: DailySnapshot): Promise<void> {
    this.ensureConnected();
    const dir = this.dayDir(snapshot.date);
    await mkdir(dir, { recursive: true });

    await Promise.all([
      writeFile(path.join(dir, "nodes.json"), JSON.stringify(snapshot.users.map(toNodeRow), null, 2)),
      writeFile(path.join(dir, "edges.json"), JSON.stringify(snapshot.follows.map(toEdgeRow), null, 2)),
      writeFile(path.join(dir, "metadata.json"), JSON.stringify(toMetadataRow(snapshot.metadata), null, 2)),
    ]);

    if (this.aggregateCsv) {
      const day = snapshotDay(snapshot.date);
      this.nodeLines.set(
        day,
        snapshot.users.map((u) =>
          csvLine([
            u.id, u.name, snapshot.date, u.latitude, u.longitude, u.regionId, u.interests.join(","), u.createdAt,
          ]),
        ),
      );
      this.edgeLines.set(
        day,
        snapshot.follows.map((f) =>
          csvLine([
            snapshot.date, f.sourceId, f.targetId, f.relationshipType, f.messageCount,
            f.lastInteraction, f.distance, f.establishedAt,
          ]),
        ),
      );
    }
  }

  private async writeAggregatedCsv(): Promise<void> {
    const days = [...this.nodeLines.keys()].sort();
    const nodes = [NODE_CSV_COLUMNS.join(","), ...days.flatMap((d) => this.nodeLines.get(d) ?? [])];
    const edges = [EDGE_CSV_COLUMNS.join(","), ...days.flatMap((d) => this.edgeLines.get(d) ?? [])];

    await writeFile(path.join(this.outputDir, "nodes.csv"), nodes.join("\n") + "\n");
    await writeFile(path.join(this.outputDir, "edges_daily.csv"), edges.join("\n") + "\n");
  }

  private async readJson<T>(file: string, schema: z.ZodType<T>): Promise<T | null> {
    let text: string;
    try {
      text = await readFile(file, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    return schema.parse(JSON.parse(text));
  }

  async getSnapshot(date: string): Promise<DailySnapshot | null> {
    this.ensureConnected();
    const dir = this.dayDir(date);

    const [nodes, edges, metadata] = await Promise.all([
      this.readJson(path.join(dir, "nodes.json"), z.array(nodeRowSchema)),
      this.readJson(path.join(dir, "edges.json"), z.array(edgeRowSchema)),
      this.readJson(path.join(dir, "metadata.json"), metadataRowSchema),
    ]);
    if (!nodes || !edges || !metadata) return null;

    return {
      date: metadata.date,
      users: nodes.map(fromNodeRow),
      follows: edges.map(fromEdgeRow),
      metadata: fromMetadataRow(metadata),
    };
  }

  async getMetadata(date: string): Promise<SnapshotMetadata | null> {
    this.ensureConnected();
    const row = await this.readJson(path.join(this.dayDir(date), "metadata.json"), metadataRowSchema);
    return row ? fromMetadataRow(row) : null;
  }

  async listSnapshotDates(): Promise<string[]> {
    this.ensureConnected();
    const entries = await readdir(this.outputDir, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory() && DAY_DIR.test(e.name))
      .map((e) => e.name)
      .sort();
  }
}

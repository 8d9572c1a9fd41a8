import neo4j, { type Driver } from "neo4j-driver";
import type { ISnapshotRepository } from "../types/repository.js";
import {
  snapshotDay,
  type DailySnapshot,
  type FollowRecord,
  type FollowType,
  type SnapshotMetadata,
  type UserRecord,
} from "../types/graph.js";
import { createDriver, DEFAULT_NEO4J_CONFIG, type Neo4jConfig } from "./connection.js";
import {
  CREATE_FOLLOWS,
  DELETE_FOLLOWS_FOR_DATE,
  GET_ALL_USERS,
  GET_FOLLOWS_FOR_DATE,
  GET_SNAPSHOT,
  LIST_SNAPSHOT_DATES,
  UPSERT_SNAPSHOT,
  UPSERT_USERS,
} from "./queries/snapshots.js";

type Props = Record<string, unknown>;

function propertiesOf(entity: unknown): Props {
  if (typeof entity === "object" && entity !== null && "properties" in entity) {
    const props = entity.properties;
    if (typeof props === "object" && props !== null) return Object.fromEntries(Object.entries(props));
  }
  return {};
}

// Integers come back as neo4j Integer objects
function toNumber(value: unknown): number {
  if (neo4j.isInt(value)) return value.toNumber();
  return typeof value === "number" ? value : Number(value ?? 0);
}

function toStringOrNull(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function toFollowType(value: unknown): FollowType {
  return value === "friend" ? "friend" : "fan";
}

function toUserRecord(props: Props): UserRecord {
  const name = toStringOrNull(props.name);
  return {
    id: toNumber(props.id),
    ...(name !== null ? { name } : {}),
    latitude: toNumber(props.latitude),
    longitude: toNumber(props.longitude),
    regionId: toNumber(props.regionId),
    interests: Array.isArray(props.interests) ? props.interests.map(String) : [],
    createdAt: toStringOrNull(props.createdAt) ?? "",
  };
}

function toMetadata(props: Props): SnapshotMetadata {
  return {
    date: toStringOrNull(props.timestamp) ?? toStringOrNull(props.date) ?? "",
    totalNodes: toNumber(props.totalNodes),
    totalEdges: toNumber(props.totalEdges),
    friendRelationships: toNumber(props.friendRelationships),
    fanRelationships: toNumber(props.fanRelationships),
    averageDegree: toNumber(props.averageDegree),
  };
}

export class Neo4jSnapshotRepository implements ISnapshotRepository {
  private driver: Driver | null = null;
  private config: Neo4jConfig;

  constructor(config?: Neo4jConfig) {
    this.config = config ?? DEFAULT_NEO4J_CONFIG;
  }

  async connect(): Promise<void> {
    this.driver = createDriver(this.config);
    await this.driver.verifyConnectivity();
  }

  async disconnect(): Promise<void> {
    await this.driver?.close();
    this.driver = null;
  }

  private getDriver(): Driver {
    if (!this.driver) throw new Error("Not connected. Call connect() first.");
    return this.driver;
  }

  async saveSnapshot(snapshot: DailySnapshot): Promise<void> {
    const date = snapshotDay(snapshot.date);
    const session = this.getDriver().session();
    try {
      await session.executeWrite(async (tx) => {
        await tx.run(UPSERT_USERS, {
          users: snapshot.users.map((u) => ({
            id: neo4j.int(u.id),
            name: u.name ?? null,
            latitude: u.latitude,
            longitude: u.longitude,
            regionId: neo4j.int(u.regionId),
            interests: u.interests,
            createdAt: u.createdAt,
          })),
        });
        await tx.run(DELETE_FOLLOWS_FOR_DATE, { date });
        await tx.run(CREATE_FOLLOWS, {
          date,
          follows: snapshot.follows.map((f) => ({
            sourceId: neo4j.int(f.sourceId),
            targetId: neo4j.int(f.targetId),
            relationshipType: f.relationshipType,
            messageCount: neo4j.int(f.messageCount),
            lastInteraction: f.lastInteraction,
            distance: f.distance,
            establishedAt: f.establishedAt,
          })),
        });
        await tx.run(UPSERT_SNAPSHOT, {
          date,
          timestamp: snapshot.metadata.date,
          totalNodes: neo4j.int(snapshot.metadata.totalNodes),
          totalEdges: neo4j.int(snapshot.metadata.totalEdges),
          friendRelationships: neo4j.int(snapshot.metadata.friendRelationships),
          fanRelationships: neo4j.int(snapshot.metadata.fanRelationships),
          averageDegree: snapshot.metadata.averageDegree,
        });
      });
    } finally {
      await session.close();
    }
  }

  async getSnapshot(date: string): Promise<DailySnapshot | null> {
    const day = snapshotDay(date);
    const session = this.getDriver().session();
    try {
      const metaResult = await session.run(GET_SNAPSHOT, { date: day });
      const metaRecord = metaResult.records[0];
      if (!metaRecord) return null;
      const metadata = toMetadata(propertiesOf(metaRecord.get("s")));

      const userResult = await session.run(GET_ALL_USERS);
      const users = userResult.records.map((r) => toUserRecord(propertiesOf(r.get("n"))));

      const followResult = await session.run(GET_FOLLOWS_FOR_DATE, { date: day });
      const follows: FollowRecord[] = followResult.records.map((r) => {
        const props = propertiesOf(r.get("r"));
        return {
          sourceId: toNumber(r.get("sourceId")),
          targetId: toNumber(r.get("targetId")),
          relationshipType: toFollowType(props.relationshipType),
          messageCount: toNumber(props.messageCount),
          lastInteraction: toStringOrNull(props.lastInteraction),
          distance: toNumber(props.distance),
          establishedAt: toStringOrNull(props.establishedAt) ?? "",
        };
      });

      return { date: metadata.date, users, follows, metadata };
    } finally {
      await session.close();
    }
  }

  async getMetadata(date: string): Promise<SnapshotMetadata | null> {
    const session = this.getDriver().session();
    try {
      const result = await session.run(GET_SNAPSHOT, { date: snapshotDay(date) });
      const record = result.records[0];
      if (!record) return null;
      return toMetadata(propertiesOf(record.get("s")));
    } finally {
      await session.close();
    }
  }

  async listSnapshotDates(): Promise<string[]> {
    const session = this.getDriver().session();
    try {
      const result = await session.run(LIST_SNAPSHOT_DATES);
      return result.records.map((r) => String(r.get("date")));
    } finally {
      await session.close();
    }
  }
}

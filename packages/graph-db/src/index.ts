export type { ISnapshotRepository } from "./types/repository.js";
export type {
  UserRecord,
  FollowType,
  FollowRecord,
  SnapshotMetadata,
  DailySnapshot,
} from "./types/graph.js";
export { snapshotDay } from "./types/graph.js";
export { Neo4jSnapshotRepository } from "./neo4j/neo4j-repository.js";
export type { Neo4jConfig } from "./neo4j/connection.js";
export { DEFAULT_NEO4J_CONFIG } from "./neo4j/connection.js";
export { InMemorySnapshotRepository } from "./memory/in-memory-repository.js";
export { FileSnapshotRepository, csvField } from "./file/file-repository.js";
export type { FileRepositoryOptions } from "./file/file-repository.js";

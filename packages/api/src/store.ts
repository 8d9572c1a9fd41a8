import {
  FileSnapshotRepository,
  InMemorySnapshotRepository,
  Neo4jSnapshotRepository,
  type ISnapshotRepository,
} from "@graphsim/graph-db";
import type { AppConfig } from "./config.js";

export function createSnapshotRepository(config: AppConfig): ISnapshotRepository {
  switch (config.store) {
    case "file":
      return new FileSnapshotRepository({ outputDir: config.outputDir });
    case "neo4j":
      return new Neo4jSnapshotRepository(config.neo4j);
    case "memory":
      return new InMemorySnapshotRepository();
  }
}

import {
  EvolutionEngine,
  GraphBuilder,
  SeededRandom,
  type GeneratorConfig,
  type GraphSummary,
  type NodeId,
  type PairRelation,
  type SimulationEvent,
} from "@graphsim/simulation";
import type { DailySnapshot, ISnapshotRepository, SnapshotMetadata, UserRecord } from "@graphsim/graph-db";
import type { IEventStore, StoredEvent } from "./event-store/types.js";
import { NameGenerator } from "./names/name-generator.js";

export interface AdvanceDayResult {
  day: number;
  date: string;
  advanced: boolean;
  events: SimulationEvent[];
  messagesSent: number;
  summary: GraphSummary;
  exported: boolean;
}

export interface RunResult {
  daysAdvanced: number;
  day: number;
  summary: GraphSummary;
  failedExports: number;
}

export interface UserView extends UserRecord {
  followers: number;
  following: number;
  viral: boolean;
}

export interface RelationshipView {
  a: NodeId;
  b: NodeId;
  relation: PairRelation;
  distance: number | null;
  mutualFriends: NodeId[];
}

export class SimulationService {
  private engine: EvolutionEngine | null = null;
  private names: string[] = [];

  constructor(
    private readonly config: GeneratorConfig,
    private readonly repo: ISnapshotRepository,
    private readonly eventStore: IEventStore,
    private readonly seed: number | string = 42,
  ) {}

  /** Builds the initial graph and persists the day-0 snapshot. */
  async init(): Promise<GraphSummary> {
    const random = new SeededRandom(this.seed);
    const graph = new GraphBuilder(this.config, random.fork("graph")).build();
    this.names = new NameGenerator(random.fork("names")).generate(graph.nodeCount);
    this.engine = new EvolutionEngine(graph, this.config, random.fork("evolution"));

    await this.exportSnapshot();
    return this.engine.summary();
  }

  private getEngine(): EvolutionEngine {
    if (!this.engine) throw new Error("Simulation not initialized. Call init() first.");
    return this.engine;
  }

  get currentDay(): number {
    return this.getEngine().day;
  }

  get currentDate(): string {
    return this.getEngine().currentDate.toISOString();
  }

  get dayCount(): number {
    return this.config.timeline.dayCount;
  }

  /** Day 0 counts as the first of `dayCount` snapshot days. */
  get isFinished(): boolean {
    return this.currentDay >= this.dayCount - 1;
  }

  async advanceDay(): Promise<AdvanceDayResult> {
    const engine = this.getEngine();

    // Nothing left to simulate
    if (this.isFinished) {
      return {
        day: engine.day,
        date: this.currentDate,
        advanced: false,
        events: [],
        messagesSent: 0,
        summary: engine.summary(),
        exported: false,
      };
    }

    const report = engine.advanceDay();

    if (report.events.length > 0) {
      this.eventStore.append(report.events.map((e) => ({ ...e })));
    }

    const exported = await this.exportSnapshot();

    return {
      day: report.day,
      date: report.date,
      advanced: true,
      events: report.events,
      messagesSent: report.messagesSent,
      summary: report.summary,
      exported,
    };
  }

  async runToEnd(onDay?: (result: AdvanceDayResult) => void): Promise<RunResult> {
    let daysAdvanced = 0;
    let failedExports = 0;
    while (!this.isFinished) {
      const result = await this.advanceDay();
      daysAdvanced++;
      if (!result.exported) failedExports++;
      onDay?.(result);
    }
    return { daysAdvanced, day: this.currentDay, summary: this.getSummary(), failedExports };
  }

  // The in-memory graph stays authoritative; a failed export is only reported
  private async exportSnapshot(): Promise<boolean> {
    const snapshot = this.toSnapshot();
    try {
      await this.repo.saveSnapshot(snapshot);
      return true;
    } catch (err) {
      console.error(`Failed to export snapshot for ${snapshot.date}:`, err);
      return false;
    }
  }

  private toSnapshot(): DailySnapshot {
    const engine = this.getEngine();
    const summary = engine.summary();
    return {
      date: summary.date,
      users: engine.getNodes().map((node) => this.toUserRecord(node)),
      follows: engine.getEdges(),
      metadata: { ...summary },
    };
  }

  private toUserRecord(node: Omit<UserRecord, "name">): UserRecord {
    const name = this.names[node.id];
    return name !== undefined ? { ...node, name } : { ...node };
  }

  getSummary(): GraphSummary {
    return this.getEngine().summary();
  }

  getUsers(offset = 0, limit = 100): UserView[] {
    const graph = this.getEngine().graph;
    const ids: NodeId[] = [];
    for (let id = offset; id < Math.min(offset + limit, graph.nodeCount); id++) ids.push(id);
    return ids.flatMap((id) => {
      const user = this.getUser(id);
      return user ? [user] : [];
    });
  }

  getUser(id: NodeId): UserView | null {
    const engine = this.getEngine();
    const node = engine.graph.getNode(id);
    if (!node) return null;
    return {
      ...this.toUserRecord({
        id: node.id,
        latitude: node.latitude,
        longitude: node.longitude,
        regionId: node.regionId,
        interests: [...node.interests],
        createdAt: node.createdAt.toISOString(),
      }),
      followers: engine.graph.inDegree(id),
      following: engine.graph.outDegree(id),
      viral: engine.isViral(id),
    };
  }

  getFollowers(id: NodeId): NodeId[] {
    return [...this.getEngine().graph.predecessors(id)].sort((a, b) => a - b);
  }

  getFollowing(id: NodeId): NodeId[] {
    return [...this.getEngine().graph.successors(id)].sort((a, b) => a - b);
  }

  getRelationship(a: NodeId, b: NodeId): RelationshipView {
    const relationships = this.getEngine().relationships;
    const relation = relationships.relationshipType(a, b);
    return {
      a,
      b,
      relation,
      distance: relation === "none" ? null : relationships.distance(a, b, relation),
      mutualFriends: [...relationships.mutualFriends(a, b)].sort((x, y) => x - y),
    };
  }

  getViralUsers(): UserView[] {
    return [...this.getEngine().viralNodes]
      .sort((a, b) => a - b)
      .flatMap((id) => {
        const user = this.getUser(id);
        return user ? [user] : [];
      });
  }

  getEventLog(userId?: NodeId, fromDay?: number, toDay?: number): StoredEvent[] {
    if (userId !== undefined) return this.eventStore.getByUser(userId, fromDay, toDay);
    return this.eventStore.getByDayRange(fromDay ?? 0, toDay ?? this.currentDay);
  }

  getPairEvents(a: NodeId, b: NodeId): StoredEvent[] {
    return this.eventStore.getByPair(a, b);
  }

  getEventCounts(fromDay?: number, toDay?: number): ReturnType<IEventStore["countByCode"]> {
    return this.eventStore.countByCode(fromDay, toDay);
  }

  getSnapshotDates(): Promise<string[]> {
    return this.repo.listSnapshotDates();
  }

  getSnapshotMetadata(date: string): Promise<SnapshotMetadata | null> {
    return this.repo.getMetadata(date);
  }
}

import { parseGeneratorConfig, parseStartDate, type GeneratorConfig } from "./config.js";
import type { RandomSource } from "./random.js";
import type { SocialGraph } from "./graph/social-graph.js";
import type { EdgeRecord, GraphSummary, NodeId, NodeRecord } from "./graph/types.js";
import { RelationshipEngine } from "./systems/relationship-system.js";
import { addDays } from "./systems/graph-builder.js";
import { summarize, toEdgeRecords, toNodeRecords } from "./snapshot.js";
import type { DayReport, FollowEventCode, SimulationEvent } from "./types.js";

interface QueuedMutation {
  sourceId: NodeId;
  targetId: NodeId;
  eventCode: FollowEventCode;
}

interface MutationQueue {
  removals: QueuedMutation[];
  additions: QueuedMutation[];
}

/**
 * Advances the graph one simulated day at a time. Every mutating step
 * collects its changes first and applies them afterwards, removals before
 * additions, so no rule reads a relation set it is in the middle of changing.
 */
export class EvolutionEngine {
  readonly relationships: RelationshipEngine;
  readonly viralNodes: ReadonlySet<NodeId>;
  private _day = 0;
  private _currentDate: Date;
  private readonly config: GeneratorConfig;

  /** Throws ConfigurationError before touching the graph if `config` is invalid. */
  constructor(
    readonly graph: SocialGraph,
    config: GeneratorConfig,
    private readonly random: RandomSource,
  ) {
    this.config = parseGeneratorConfig(config);
    this.relationships = new RelationshipEngine(graph, this.config.distance);
    this._currentDate = parseStartDate(this.config);
    this.viralNodes = this.selectViralNodes();
    this.relationships.refresh();
  }

  get day(): number {
    return this._day;
  }

  get currentDate(): Date {
    return new Date(this._currentDate.getTime());
  }

  isViral(id: NodeId): boolean {
    return this.viralNodes.has(id);
  }

  advanceDay(): DayReport {
    this._day++;
    this._currentDate = addDays(this._currentDate, 1);

    const events: SimulationEvent[] = [];
    const messagesSent = this.updateMessageCounts();

    this.applyQueue(this.collectTransitions(), events, false);
    this.applyQueue(this.collectPopularityChanges(), events, true);

    this.relationships.refresh();

    return {
      day: this._day,
      date: this._currentDate.toISOString(),
      events,
      messagesSent,
      summary: this.summary(),
    };
  }

  run(days: number): DayReport[] {
    const reports: DayReport[] = [];
    for (let i = 0; i < days; i++) {
      reports.push(this.advanceDay());
    }
    return reports;
  }

  summary(): GraphSummary {
    return summarize(this.graph, this._currentDate);
  }

  getNodes(): NodeRecord[] {
    return toNodeRecords(this.graph);
  }

  getEdges(): EdgeRecord[] {
    return toEdgeRecords(this.graph);
  }

  private selectViralNodes(): ReadonlySet<NodeId> {
    const ranked = this.graph
      .getAllNodes()
      .map((node) => node.id)
      .sort((a, b) => this.graph.inDegree(b) - this.graph.inDegree(a) || a - b);
    return new Set(ranked.slice(0, this.config.popularity.viralNodeCount));
  }

  private updateMessageCounts(): number {
    const { dailyProbability, minPerDay, maxPerDay } = this.config.messages;
    let sent = 0;

    for (const edge of this.graph.getAllEdges()) {
      if (!this.random.chance(dailyProbability)) continue;
      const increment = this.random.int(minPerDay, maxPerDay);
      edge.messageCount += increment;
      edge.lastInteraction = this._currentDate;
      sent += increment;
    }
    return sent;
  }

  private collectTransitions(): MutationQueue {
    const { friendToFan, fanToFriend, breakConnection, newConnection } = this.config.transitions;
    const queue: MutationQueue = { removals: [], additions: [] };

    for (const edge of this.graph.getAllEdges()) {
      const { sourceId, targetId } = edge;
      const relation = this.relationships.relationshipType(sourceId, targetId);

      // friend pairs are visited from both edges; roll once per pair
      if (relation === "friend" && sourceId < targetId) {
        if (this.random.chance(friendToFan)) {
          const removal = this.random.chance(0.5)
            ? { sourceId, targetId }
            : { sourceId: targetId, targetId: sourceId };
          queue.removals.push({ ...removal, eventCode: "UNFOLLOW" });
        }
      } else if (relation === "fan") {
        if (this.random.chance(fanToFriend)) {
          queue.additions.push({ sourceId: targetId, targetId: sourceId, eventCode: "FOLLOW_BACK" });
        }
      }

      if (this.random.chance(breakConnection)) {
        queue.removals.push({ sourceId, targetId, eventCode: "CONNECTION_BROKEN" });
      }
    }

    const nodeCount = this.graph.nodeCount;
    const newPairs = nodeCount >= 2 ? Math.floor(nodeCount * newConnection) : 0;
    for (let i = 0; i < newPairs; i++) {
      const sourceId = this.random.int(0, nodeCount - 1);
      let targetId = this.random.int(0, nodeCount - 2);
      if (targetId >= sourceId) targetId++;
      if (this.graph.hasEdge(sourceId, targetId)) continue;
      queue.additions.push({ sourceId, targetId, eventCode: "NEW_CONNECTION" });
    }

    return queue;
  }

  private collectPopularityChanges(): MutationQueue {
    const { viralGainFans, viralLoseFans, normalGainFans, normalLoseFans } = this.config.popularity;
    const queue: MutationQueue = { removals: [], additions: [] };
    const nodes = this.graph.getAllNodes();

    for (const node of nodes) {
      const viral = this.isViral(node.id);

      if (this.random.chance(viral ? viralGainFans : normalGainFans)) {
        const followers = this.graph.predecessors(node.id);
        const potentialFans = nodes.filter((n) => n.id !== node.id && !followers.has(n.id));
        if (potentialFans.length > 0) {
          const fan = this.random.choice(potentialFans);
          queue.additions.push({ sourceId: fan.id, targetId: node.id, eventCode: "FAN_GAINED" });
        }
      }

      if (this.random.chance(viral ? viralLoseFans : normalLoseFans)) {
        const currentFans = [...this.graph.predecessors(node.id)];
        if (currentFans.length > 0) {
          const lost = this.random.choice(currentFans);
          if (this.relationships.relationshipType(lost, node.id) === "fan") {
            queue.removals.push({ sourceId: lost, targetId: node.id, eventCode: "FAN_LOST" });
          }
        }
      }
    }

    return queue;
  }

  /**
   * Stale entries (edge already gone, or already present) are skipped.
   * With fanOnly, a removal is also skipped when the pair has become mutual.
   */
  private applyQueue(queue: MutationQueue, events: SimulationEvent[], fanOnly: boolean): void {
    for (const removal of queue.removals) {
      const { sourceId, targetId } = removal;
      if (!this.graph.hasEdge(sourceId, targetId)) continue;

      const before = this.relationships.relationshipType(sourceId, targetId);
      if (fanOnly && before !== "fan") continue;

      this.graph.removeEdge(sourceId, targetId);
      events.push(this.toEvent(removal, before));
    }

    for (const addition of queue.additions) {
      const { sourceId, targetId } = addition;
      const before = this.relationships.relationshipType(sourceId, targetId);
      if (!this.graph.addEdge(sourceId, targetId, this._currentDate)) continue;
      events.push(this.toEvent(addition, before));
    }
  }

  private toEvent(mutation: QueuedMutation, relationBefore: SimulationEvent["relationBefore"]): SimulationEvent {
    return {
      day: this._day,
      date: this._currentDate.toISOString(),
      sourceId: mutation.sourceId,
      targetId: mutation.targetId,
      eventCode: mutation.eventCode,
      relationBefore,
      relationAfter: this.relationships.relationshipType(mutation.sourceId, mutation.targetId),
    };
  }
}

import { GraphInvariantError } from "../errors.js";
import type { FollowEdge, NodeId, UserNode } from "./types.js";

const EMPTY: ReadonlySet<NodeId> = new Set();

/**
 * Fixed node array plus directed edges keyed by ordered pair.
 * Node ids are dense: the n-th node added gets id n.
 */
export class SocialGraph {
  private nodes: UserNode[] = [];
  private edges = new Map<string, FollowEdge>(); // key: "sourceId->targetId"
  private outgoing: Set<NodeId>[] = [];
  private incoming: Set<NodeId>[] = [];

  private edgeKey(sourceId: NodeId, targetId: NodeId): string {
    return `${sourceId}->${targetId}`;
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  get edgeCount(): number {
    return this.edges.size;
  }

  addNode(attrs: Omit<UserNode, "id">): UserNode {
    const node: UserNode = { id: this.nodes.length, ...attrs };
    this.nodes.push(node);
    this.outgoing.push(new Set());
    this.incoming.push(new Set());
    return node;
  }

  getNode(id: NodeId): UserNode | undefined {
    return this.nodes[id];
  }

  hasNode(id: NodeId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.nodes.length;
  }

  getAllNodes(): readonly UserNode[] {
    return this.nodes;
  }

  hasEdge(sourceId: NodeId, targetId: NodeId): boolean {
    return this.edges.has(this.edgeKey(sourceId, targetId));
  }

  getEdge(sourceId: NodeId, targetId: NodeId): FollowEdge | undefined {
    return this.edges.get(this.edgeKey(sourceId, targetId));
  }

  /** Snapshot of current edges in insertion order; safe to iterate while mutating. */
  getAllEdges(): FollowEdge[] {
    return [...this.edges.values()];
  }

  /**
   * Adds source -> target. Returns false, leaving the graph untouched,
   * when the edge already exists.
   */
  addEdge(sourceId: NodeId, targetId: NodeId, establishedAt: Date): boolean {
    if (sourceId === targetId) {
      throw new GraphInvariantError(`Self-loop on node ${sourceId}`);
    }
    if (!this.hasNode(sourceId) || !this.hasNode(targetId)) {
      throw new GraphInvariantError(`Unknown node in edge ${sourceId}->${targetId}`);
    }
    const key = this.edgeKey(sourceId, targetId);
    if (this.edges.has(key)) return false;

    this.edges.set(key, {
      sourceId,
      targetId,
      messageCount: 0,
      lastInteraction: null,
      establishedAt,
      relationshipType: "fan",
      distance: Number.POSITIVE_INFINITY,
    });
    this.outgoing[sourceId].add(targetId);
    this.incoming[targetId].add(sourceId);
    return true;
  }

  /** Returns false when the edge does not exist. */
  removeEdge(sourceId: NodeId, targetId: NodeId): boolean {
    if (!this.edges.delete(this.edgeKey(sourceId, targetId))) return false;
    this.outgoing[sourceId].delete(targetId);
    this.incoming[targetId].delete(sourceId);
    return true;
  }

  /** Nodes this node follows. */
  successors(id: NodeId): ReadonlySet<NodeId> {
    return this.outgoing[id] ?? EMPTY;
  }

  /** Nodes following this node. */
  predecessors(id: NodeId): ReadonlySet<NodeId> {
    return this.incoming[id] ?? EMPTY;
  }

  inDegree(id: NodeId): number {
    return this.predecessors(id).size;
  }

  outDegree(id: NodeId): number {
    return this.successors(id).size;
  }
}

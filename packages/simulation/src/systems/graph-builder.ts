import { parseGeneratorConfig, parseStartDate, type GeneratorConfig } from "../config.js";
import type { RandomSource } from "../random.js";
import { SocialGraph } from "../graph/social-graph.js";
import type { NodeId } from "../graph/types.js";
import {
  SimilarityModel,
  connectionProbability,
  geographicSimilarity,
  interestSimilarity,
} from "./similarity.js";

const DAY_MS = 24 * 60 * 60 * 1000;

// Per-direction follow chance spans [0.3, 0.7] with pair similarity
const DIRECTION_BASE = 0.3;
const DIRECTION_SIMILARITY_SPAN = 0.4;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

interface CandidateEdge {
  sourceId: NodeId;
  targetId: NodeId;
}

export class GraphBuilder {
  readonly graph = new SocialGraph();
  readonly similarity: SimilarityModel;
  private readonly startDate: Date;
  private readonly config: GeneratorConfig;

  constructor(
    config: GeneratorConfig,
    private readonly random: RandomSource,
  ) {
    this.config = parseGeneratorConfig(config);
    this.similarity = new SimilarityModel(this.config, random);
    this.startDate = parseStartDate(this.config);
  }

  generateNodes(count: number = this.config.graph.nodeCount): void {
    const { minInterestsPerUser, maxInterestsPerUser } = this.config.graph;
    const { accountCreationStartDaysBefore, accountCreationEndDaysBefore } = this.config.timeline;

    for (let i = 0; i < count; i++) {
      const location = this.similarity.assignLocation();
      const interests = this.similarity.assignInterests(minInterestsPerUser, maxInterestsPerUser);
      const daysBefore = this.random.int(accountCreationEndDaysBefore, accountCreationStartDaysBefore);

      this.graph.addNode({
        ...location,
        interests,
        createdAt: addDays(this.startDate, -daysBefore),
      });
    }
  }

  /**
   * Every ordered pair (i, j) gets a pairwise draw; on success each
   * direction is tried on its own. Each source node scans with its own
   * forked stream, so candidate collection does not depend on scan order.
   */
  generateEdges(): void {
    const nodes = this.graph.getAllNodes();

    for (const node of nodes) {
      for (const candidate of this.collectCandidates(node.id)) {
        this.graph.addEdge(candidate.sourceId, candidate.targetId, this.startDate);
      }
    }
  }

  private collectCandidates(sourceId: NodeId): CandidateEdge[] {
    const nodes = this.graph.getAllNodes();
    const source = nodes[sourceId];
    const stream = this.random.fork(`edges:${sourceId}`);
    const candidates: CandidateEdge[] = [];

    for (const target of nodes) {
      if (target.id === sourceId) continue;

      const probability = connectionProbability(
        source.regionId,
        target.regionId,
        source.interests,
        target.interests,
        this.config.connection,
      );
      if (!stream.chance(probability)) continue;

      const similarity =
        (geographicSimilarity(source.regionId, target.regionId) +
          interestSimilarity(source.interests, target.interests)) /
        2;
      const directionChance = DIRECTION_BASE + similarity * DIRECTION_SIMILARITY_SPAN;

      if (stream.chance(directionChance)) {
        candidates.push({ sourceId, targetId: target.id });
      }
      if (stream.chance(directionChance)) {
        candidates.push({ sourceId: target.id, targetId: sourceId });
      }
    }

    return candidates;
  }

  build(): SocialGraph {
    this.generateNodes();
    this.generateEdges();
    return this.graph;
  }
}

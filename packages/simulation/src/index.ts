export { SeededRandom } from "./random.js";
export type { RandomSource } from "./random.js";
export { ConfigurationError, GraphInvariantError } from "./errors.js";
export {
  GENERATOR_SMALL,
  GENERATOR_STANDARD,
  GENERATOR_LARGE,
  getGeneratorConfig,
  parseGeneratorConfig,
  parseStartDate,
  generatorConfigSchema,
} from "./config.js";
export type { GeneratorConfig, GeneratorPreset } from "./config.js";
export { SocialGraph } from "./graph/social-graph.js";
export type {
  NodeId,
  RelationshipType,
  PairRelation,
  UserNode,
  FollowEdge,
  NodeRecord,
  EdgeRecord,
  GraphSummary,
} from "./graph/types.js";
export {
  SimilarityModel,
  geographicSimilarity,
  interestSimilarity,
  connectionProbability,
} from "./systems/similarity.js";
export type { Location, ConnectionKnobs } from "./systems/similarity.js";
export { GraphBuilder, addDays } from "./systems/graph-builder.js";
export { RelationshipEngine } from "./systems/relationship-system.js";
export { EvolutionEngine } from "./engine.js";
export { toNodeRecords, toEdgeRecords, summarize } from "./snapshot.js";
export type { SimulationEvent, DayReport, FollowEventCode } from "./types.js";

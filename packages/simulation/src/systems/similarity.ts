import type { GeneratorConfig } from "../config.js";
import type { RandomSource } from "../random.js";

export interface Location {
  latitude: number;
  longitude: number;
  regionId: number;
}

interface RegionCenter {
  latitude: number;
  longitude: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Geographic and interest homophily. Region centers are drawn once, when the
 * model is created, and shared by every node it places.
 */
export class SimilarityModel {
  readonly interestPool: readonly string[];
  private readonly regionCenters: readonly RegionCenter[];

  constructor(
    private readonly config: GeneratorConfig,
    private readonly random: RandomSource,
  ) {
    this.interestPool = Array.from(
      { length: config.graph.interestCategoryCount },
      (_, i) => `interest_${i}`,
    );
    this.regionCenters = Array.from({ length: config.graph.regionCount }, () => ({
      latitude: random.uniform(-90, 90),
      longitude: random.uniform(-180, 180),
    }));
  }

  get regions(): readonly RegionCenter[] {
    return this.regionCenters;
  }

  assignLocation(): Location {
    const regionId = this.random.int(0, this.regionCenters.length - 1);
    const center = this.regionCenters[regionId];
    const spread = this.config.graph.locationSpread;

    return {
      latitude: clamp(center.latitude + this.random.gaussian(0, spread), -90, 90),
      longitude: clamp(center.longitude + this.random.gaussian(0, spread), -180, 180),
      regionId,
    };
  }

  assignInterests(minInterests: number, maxInterests: number): Set<string> {
    const count = this.random.int(minInterests, maxInterests);
    return new Set(this.random.sample(this.interestPool, count));
  }
}

/** Binary: same region or not. */
export function geographicSimilarity(region1: number, region2: number): number {
  return region1 === region2 ? 1.0 : 0.0;
}

/** Jaccard index; 0 when either side is empty. */
export function interestSimilarity(
  interests1: ReadonlySet<string>,
  interests2: ReadonlySet<string>,
): number {
  if (interests1.size === 0 || interests2.size === 0) return 0.0;

  let intersection = 0;
  for (const interest of interests1) {
    if (interests2.has(interest)) intersection++;
  }
  const union = interests1.size + interests2.size - intersection;
  return intersection / union;
}

export interface ConnectionKnobs {
  baseProbability: number;
  geographicBoost: number;
  interestOverlapBoost: number;
  maxInterestBoost: number;
  interestScale: number;
}

export function connectionProbability(
  region1: number,
  region2: number,
  interests1: ReadonlySet<string>,
  interests2: ReadonlySet<string>,
  knobs: ConnectionKnobs,
): number {
  let probability = knobs.baseProbability;

  if (geographicSimilarity(region1, region2) > 0) {
    probability += knobs.geographicBoost;
  }

  const jaccard = interestSimilarity(interests1, interests2);
  probability += Math.min(
    jaccard * knobs.interestOverlapBoost * knobs.interestScale,
    knobs.maxInterestBoost,
  );

  return clamp(probability, 0, 1);
}

// Generator configuration: numeric knobs per preset

import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export type GeneratorPreset = "small" | "standard" | "large";

export interface GeneratorConfig {
  preset: GeneratorPreset;

  graph: {
    nodeCount: number;
    regionCount: number;
    interestCategoryCount: number;
    minInterestsPerUser: number;
    maxInterestsPerUser: number;
    locationSpread: number; // std-dev of coordinate noise, degrees
  };

  connection: {
    baseProbability: number;
    geographicBoost: number;
    interestOverlapBoost: number;
    maxInterestBoost: number;
    interestScale: number; // multiplies jaccard * interestOverlapBoost
  };

  distance: {
    friendBase: number;
    fanBase: number;
    mutualFriendWeight: number;
    messageFrequencyWeight: number;
    minimum: number;
  };

  timeline: {
    dayCount: number;
    startDate: string; // YYYY-MM-DD, UTC
    accountCreationStartDaysBefore: number;
    accountCreationEndDaysBefore: number;
  };

  messages: {
    dailyProbability: number;
    minPerDay: number;
    maxPerDay: number;
  };

  transitions: {
    friendToFan: number;
    fanToFriend: number;
    newConnection: number;
    breakConnection: number;
  };

  popularity: {
    viralNodeCount: number;
    viralGainFans: number;
    viralLoseFans: number;
    normalGainFans: number;
    normalLoseFans: number;
  };
}

export const GENERATOR_STANDARD: GeneratorConfig = {
  preset: "standard",

  graph: {
    nodeCount: 1000,
    regionCount: 8,
    interestCategoryCount: 20,
    minInterestsPerUser: 2,
    maxInterestsPerUser: 5,
    locationSpread: 10,
  },

  connection: {
    baseProbability: 0.02,
    geographicBoost: 0.15,
    interestOverlapBoost: 0.10,
    maxInterestBoost: 0.30,
    interestScale: 10,
  },

  distance: {
    friendBase: 5.0,
    fanBase: 15.0,
    mutualFriendWeight: 0.5,
    messageFrequencyWeight: 0.3,
    minimum: 0.1,
  },

  timeline: {
    dayCount: 90,
    startDate: "2024-01-01",
    accountCreationStartDaysBefore: 180,
    accountCreationEndDaysBefore: 0,
  },

  messages: {
    dailyProbability: 0.3,
    minPerDay: 0,
    maxPerDay: 10,
  },

  transitions: {
    friendToFan: 0.01,
    fanToFriend: 0.02,
    newConnection: 0.005,
    breakConnection: 0.003,
  },

  popularity: {
    viralNodeCount: 10,
    viralGainFans: 0.15,
    viralLoseFans: 0.05,
    normalGainFans: 0.01,
    normalLoseFans: 0.005,
  },
};

export const GENERATOR_SMALL: GeneratorConfig = {
  ...GENERATOR_STANDARD,
  preset: "small",

  graph: {
    ...GENERATOR_STANDARD.graph,
    nodeCount: 100,
    regionCount: 4,
  },

  timeline: {
    ...GENERATOR_STANDARD.timeline,
    dayCount: 30,
  },

  transitions: {
    ...GENERATOR_STANDARD.transitions,
    newConnection: 0.02,
  },

  popularity: {
    ...GENERATOR_STANDARD.popularity,
    viralNodeCount: 3,
  },
};

export const GENERATOR_LARGE: GeneratorConfig = {
  ...GENERATOR_STANDARD,
  preset: "large",

  graph: {
    ...GENERATOR_STANDARD.graph,
    nodeCount: 3000,
    regionCount: 16,
    interestCategoryCount: 40,
  },

  connection: {
    ...GENERATOR_STANDARD.connection,
    baseProbability: 0.005,
    geographicBoost: 0.05,
  },

  timeline: {
    ...GENERATOR_STANDARD.timeline,
    dayCount: 180,
    accountCreationStartDaysBefore: 365,
  },

  popularity: {
    ...GENERATOR_STANDARD.popularity,
    viralNodeCount: 30,
  },
};

const GENERATOR_CONFIGS: Record<GeneratorPreset, GeneratorConfig> = {
  small: GENERATOR_SMALL,
  standard: GENERATOR_STANDARD,
  large: GENERATOR_LARGE,
};

export function getGeneratorConfig(preset: GeneratorPreset): GeneratorConfig {
  return GENERATOR_CONFIGS[preset];
}

const probability = z.number().min(0).max(1);
const nonNegative = z.number().min(0);
const positiveInt = z.number().int().positive();

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "must be YYYY-MM-DD")
  .refine((s) => !Number.isNaN(Date.parse(`${s}T00:00:00Z`)), "must be a valid date");

export const generatorConfigSchema = z
  .object({
    preset: z.enum(["small", "standard", "large"]),
    graph: z.object({
      nodeCount: positiveInt,
      regionCount: positiveInt,
      interestCategoryCount: positiveInt,
      minInterestsPerUser: z.number().int().min(0),
      maxInterestsPerUser: z.number().int().min(0),
      locationSpread: nonNegative,
    }),
    connection: z.object({
      baseProbability: probability,
      geographicBoost: nonNegative,
      interestOverlapBoost: nonNegative,
      maxInterestBoost: nonNegative,
      interestScale: nonNegative,
    }),
    distance: z.object({
      friendBase: nonNegative,
      fanBase: nonNegative,
      mutualFriendWeight: nonNegative,
      messageFrequencyWeight: nonNegative,
      minimum: z.number().positive(),
    }),
    timeline: z.object({
      dayCount: positiveInt,
      startDate: isoDate,
      accountCreationStartDaysBefore: z.number().int().min(0),
      accountCreationEndDaysBefore: z.number().int().min(0),
    }),
    messages: z.object({
      dailyProbability: probability,
      minPerDay: z.number().int().min(0),
      maxPerDay: z.number().int().min(0),
    }),
    transitions: z.object({
      friendToFan: probability,
      fanToFriend: probability,
      newConnection: probability,
      breakConnection: probability,
    }),
    popularity: z.object({
      viralNodeCount: z.number().int().min(0),
      viralGainFans: probability,
      viralLoseFans: probability,
      normalGainFans: probability,
      normalLoseFans: probability,
    }),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.graph.minInterestsPerUser > cfg.graph.maxInterestsPerUser) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["graph", "minInterestsPerUser"],
        message: "must not exceed maxInterestsPerUser",
      });
    }
    if (cfg.graph.maxInterestsPerUser > cfg.graph.interestCategoryCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["graph", "maxInterestsPerUser"],
        message: "must not exceed interestCategoryCount",
      });
    }
    if (cfg.messages.minPerDay > cfg.messages.maxPerDay) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["messages", "minPerDay"],
        message: "must not exceed maxPerDay",
      });
    }
    if (cfg.timeline.accountCreationEndDaysBefore > cfg.timeline.accountCreationStartDaysBefore) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["timeline", "accountCreationEndDaysBefore"],
        message: "must not exceed accountCreationStartDaysBefore",
      });
    }
    if (cfg.popularity.viralNodeCount > cfg.graph.nodeCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["popularity", "viralNodeCount"],
        message: "must not exceed nodeCount",
      });
    }
  });

/**
 * Validate an untrusted configuration object.
 * Throws ConfigurationError listing every issue found.
 */
export function parseGeneratorConfig(input: unknown): GeneratorConfig {
  const result = generatorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return result.data;
}

/** Parse a YYYY-MM-DD string as a UTC midnight Date. */
export function parseStartDate(config: GeneratorConfig): Date {
  return new Date(`${config.timeline.startDate}T00:00:00Z`);
}

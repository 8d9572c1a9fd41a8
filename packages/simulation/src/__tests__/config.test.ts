import { describe, it, expect } from "vitest";
import {
  GENERATOR_SMALL,
  GENERATOR_STANDARD,
  GENERATOR_LARGE,
  getGeneratorConfig,
  parseGeneratorConfig,
  parseStartDate,
  type GeneratorConfig,
} from "../config.js";
import { ConfigurationError } from "../errors.js";

function expectIssues(config: unknown): string[] {
  try {
    parseGeneratorConfig(config);
  } catch (err) {
    expect(err).toBeInstanceOf(ConfigurationError);
    if (err instanceof ConfigurationError) return err.issues;
  }
  throw new Error("expected a ConfigurationError");
}

describe("GeneratorConfig", () => {
  const presets: [string, GeneratorConfig][] = [
    ["small", GENERATOR_SMALL],
    ["standard", GENERATOR_STANDARD],
    ["large", GENERATOR_LARGE],
  ];

  it("getGeneratorConfig returns the matching preset", () => {
    expect(getGeneratorConfig("small")).toBe(GENERATOR_SMALL);
    expect(getGeneratorConfig("standard")).toBe(GENERATOR_STANDARD);
    expect(getGeneratorConfig("large")).toBe(GENERATOR_LARGE);
  });

  it.each(presets)("%s preset passes validation", (_, config) => {
    expect(parseGeneratorConfig(config)).toEqual(config);
  });

  it("node count grows with preset size", () => {
    expect(GENERATOR_SMALL.graph.nodeCount).toBeLessThan(GENERATOR_STANDARD.graph.nodeCount);
    expect(GENERATOR_STANDARD.graph.nodeCount).toBeLessThan(GENERATOR_LARGE.graph.nodeCount);
  });

  it("standard preset carries the reference constants", () => {
    expect(GENERATOR_STANDARD.connection).toEqual({
      baseProbability: 0.02,
      geographicBoost: 0.15,
      interestOverlapBoost: 0.10,
      maxInterestBoost: 0.30,
      interestScale: 10,
    });
    expect(GENERATOR_STANDARD.timeline.dayCount).toBe(90);
    expect(GENERATOR_STANDARD.popularity.viralNodeCount).toBe(10);
  });

  it("parses the start date as UTC midnight", () => {
    expect(parseStartDate(GENERATOR_STANDARD).toISOString()).toBe("2024-01-01T00:00:00.000Z");
  });

  describe("rejects invalid configurations", () => {
    it("min interests above max interests", () => {
      const issues = expectIssues({
        ...GENERATOR_STANDARD,
        graph: { ...GENERATOR_STANDARD.graph, minInterestsPerUser: 6, maxInterestsPerUser: 3 },
      });
      expect(issues).toEqual(["graph.minInterestsPerUser: must not exceed maxInterestsPerUser"]);
    });

    it("max interests above the vocabulary size", () => {
      const issues = expectIssues({
        ...GENERATOR_STANDARD,
        graph: { ...GENERATOR_STANDARD.graph, maxInterestsPerUser: 25 },
      });
      expect(issues).toEqual(["graph.maxInterestsPerUser: must not exceed interestCategoryCount"]);
    });

    it("negative or out-of-range probabilities", () => {
      const issues = expectIssues({
        ...GENERATOR_STANDARD,
        transitions: { ...GENERATOR_STANDARD.transitions, friendToFan: -0.1, breakConnection: 1.5 },
      });
      expect(issues).toHaveLength(2);
      expect(issues[0]).toMatch(/^transitions\.friendToFan: /);
      expect(issues[1]).toMatch(/^transitions\.breakConnection: /);
    });

    it("non-positive node and day counts", () => {
      const issues = expectIssues({
        ...GENERATOR_STANDARD,
        graph: { ...GENERATOR_STANDARD.graph, nodeCount: 0 },
        timeline: { ...GENERATOR_STANDARD.timeline, dayCount: -3 },
      });
      const paths = issues.map((i) => i.split(":")[0]);
      expect(paths).toContain("graph.nodeCount");
      expect(paths).toContain("timeline.dayCount");
    });

    it("a zero distance floor", () => {
      const issues = expectIssues({
        ...GENERATOR_STANDARD,
        distance: { ...GENERATOR_STANDARD.distance, minimum: 0 },
      });
      expect(issues.map((i) => i.split(":")[0])).toEqual(["distance.minimum"]);
    });

    it("a malformed start date", () => {
      const issues = expectIssues({
        ...GENERATOR_STANDARD,
        timeline: { ...GENERATOR_STANDARD.timeline, startDate: "January 1st" },
      });
      expect(issues).toContain("timeline.startDate: must be YYYY-MM-DD");
    });

    it("an inverted account-creation window and message range", () => {
      const issues = expectIssues({
        ...GENERATOR_STANDARD,
        timeline: { ...GENERATOR_STANDARD.timeline, accountCreationEndDaysBefore: 200 },
        messages: { ...GENERATOR_STANDARD.messages, minPerDay: 20 },
      });
      expect(issues).toEqual([
        "messages.minPerDay: must not exceed maxPerDay",
        "timeline.accountCreationEndDaysBefore: must not exceed accountCreationStartDaysBefore",
      ]);
    });

    it("more viral nodes than nodes", () => {
      const issues = expectIssues({
        ...GENERATOR_SMALL,
        popularity: { ...GENERATOR_SMALL.popularity, viralNodeCount: 500 },
      });
      expect(issues).toEqual(["popularity.viralNodeCount: must not exceed nodeCount"]);
    });

    it("non-object input", () => {
      expect(() => parseGeneratorConfig("standard")).toThrow(ConfigurationError);
    });
  });
});

import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  ConfigurationError,
  getGeneratorConfig,
  parseGeneratorConfig,
  type GeneratorConfig,
  type GeneratorPreset,
} from "@graphsim/simulation";
import { DEFAULT_NEO4J_CONFIG, type Neo4jConfig } from "@graphsim/graph-db";

export type StoreKind = "memory" | "file" | "neo4j";

export interface AppConfig {
  preset: GeneratorPreset;
  generator: GeneratorConfig;
  seed: number | string;
  store: StoreKind;
  outputDir: string;
  eventDbPath: string;
  neo4j: Neo4jConfig;
  port: number;
}

export const DEFAULT_SEED = 42;

const envSchema = z.object({
  GRAPHSIM_PRESET: z.enum(["small", "standard", "large"]).default("standard"),
  GRAPHSIM_CONFIG: z.string().min(1).optional(),
  GRAPHSIM_SEED: z.string().min(1).optional(),
  GRAPHSIM_STORE: z.enum(["memory", "file", "neo4j"]).optional(),
  GRAPHSIM_OUTPUT_DIR: z.string().min(1).default("output"),
  GRAPHSIM_EVENT_DB: z.string().min(1).default(":memory:"),
  NEO4J_URI: z.string().min(1).default(DEFAULT_NEO4J_CONFIG.uri),
  NEO4J_USERNAME: z.string().min(1).default(DEFAULT_NEO4J_CONFIG.username),
  NEO4J_PASSWORD: z.string().min(1).default(DEFAULT_NEO4J_CONFIG.password),
  PORT: z.coerce.number().int().positive().default(3001),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Objects merge key by key; anything else in `override` replaces `base`. */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = deepMerge(base[key], value);
  }
  return merged;
}

function readOverrides(file: string): unknown {
  let text: string;
  try {
    text = readFileSync(file, "utf8");
  } catch (err) {
    throw new ConfigurationError([`GRAPHSIM_CONFIG: cannot read ${file} (${errorMessage(err)})`]);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError([`GRAPHSIM_CONFIG: ${file} is not valid JSON (${errorMessage(err)})`]);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function parseSeed(raw: string | undefined): number | string {
  if (raw === undefined) return DEFAULT_SEED;
  return /^-?\d+$/.test(raw) ? Number(raw) : raw;
}

export function loadAppConfig(
  env: Record<string, string | undefined> = process.env,
  fallbackStore: StoreKind = "memory",
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const vars = parsed.data;

  const preset = getGeneratorConfig(vars.GRAPHSIM_PRESET);
  const generator = vars.GRAPHSIM_CONFIG
    ? parseGeneratorConfig(deepMerge(preset, readOverrides(vars.GRAPHSIM_CONFIG)))
    : parseGeneratorConfig(preset);

  return {
    preset: vars.GRAPHSIM_PRESET,
    generator,
    seed: parseSeed(vars.GRAPHSIM_SEED),
    store: vars.GRAPHSIM_STORE ?? fallbackStore,
    outputDir: vars.GRAPHSIM_OUTPUT_DIR,
    eventDbPath: vars.GRAPHSIM_EVENT_DB,
    neo4j: {
      uri: vars.NEO4J_URI,
      username: vars.NEO4J_USERNAME,
      password: vars.NEO4J_PASSWORD,
    },
    port: vars.PORT,
  };
}

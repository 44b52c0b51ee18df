import { existsSync, readFileSync } from "fs";
import { join, resolve } from "path";
import type { SourceKind } from "@energy-pipeline/shared";
import { describeError, isSourceKind, SOURCE_KINDS } from "@energy-pipeline/shared";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { PipelineConfig } from "../core/types";
import { envFlag, envValue } from "./env";

export const CONFIG_FILE_NAME = "pipeline.config.yaml";

const syntheticQualitySchema = z.enum(["basic", "standard", "high"]);

const sourceSchema = z.object({
  endpointUrl: z.string().url(),
  fallbackUrls: z.array(z.string().url()).default([]),
  forecastUrl: z.string().url().optional(),
  enableSyntheticFallback: z.boolean().default(true),
  syntheticQuality: syntheticQualitySchema.default("high"),
  intervalSeconds: z.number().int().positive(),
  lookbackMinutes: z.number().int().positive()
});

const locationSchema = z.object({
  locationId: z.string().min(1),
  name: z.string().min(1),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  timezone: z.string().default("UTC"),
  countryCode: z.string().length(2)
});

const householdMetadataSchema = z.object({
  locationName: z.string().min(1),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  timezone: z.string().default("UTC"),
  installationDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
    .optional(),
  meterType: z.string().min(1).default("smart_meter"),
  samplingMinutes: z.number().int().positive().default(1),
  dataSource: z.string().min(1)
});

const weightsSchema = z
  .object({
    freshness: z.number().min(0).default(1),
    completeness: z.number().min(0).default(1),
    accuracy: z.number().min(0).default(1),
    consistency: z.number().min(0).default(1)
  })
  .refine((weights) => weights.freshness + weights.completeness + weights.accuracy + weights.consistency > 0, {
    message: "quality weights must not all be zero"
  });

const ingestionSchema = z
  .object({
    batchSize: z.number().int().positive().default(1000),
    maxRetries: z.number().int().positive().default(10),
    retryDelaySeconds: z.number().min(0).default(60),
    maxRetryDelaySeconds: z.number().min(0).default(900),
    backoff: z.enum(["fixed", "exponential"]).default("exponential"),
    chunkRetries: z.number().int().min(0).default(2),
    strictValidation: z.boolean().default(false),
    rejectionTolerance: z.number().min(0).max(1).default(0.2),
    strictRejectionTolerance: z.number().min(0).max(1).default(0),
    minCompleteness: z.number().min(0).max(1).default(0.95),
    qualityWeights: weightsSchema.default({}),
    dataRetentionDays: z.number().int().positive().default(1095),
    gapLookbackDays: z.number().int().positive().default(90),
    maxGapDays: z.number().positive().default(7),
    requestTimeoutMs: z.number().int().positive().default(30000),
    drainTimeoutMs: z.number().int().min(0).default(30000)
  })
  .default({});

const pipelineConfigSchema = z.object({
  householdId: z.string().min(1),
  householdMetadata: householdMetadataSchema.optional(),
  gridCountries: z.array(z.string().length(2).transform((code) => code.toUpperCase())).min(1),
  weatherLocations: z.array(locationSchema).min(1),
  sources: z.object({
    household: sourceSchema,
    weather: sourceSchema,
    grid: sourceSchema
  }),
  ingestion: ingestionSchema
});

export type IngestionMode = "streaming" | "queue";

export interface RuntimeConfig {
  pipeline: PipelineConfig;
  databaseUrl: string | undefined;
  logLevel: string;
  mode: IngestionMode;
  redisUrl: string;
  queueName: string;
  sources: SourceKind[];
  dbPoolMax: number;
  dbIdleTimeoutMs: number;
}

const connectionEnvSchema = z.object({
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_IDLE_TIMEOUT_MS: z.coerce.number().int().min(0).default(10000)
});

export function parseConnectionEnv(env: NodeJS.ProcessEnv): { dbPoolMax: number; dbIdleTimeoutMs: number } {
  const parsed = connectionEnvSchema.safeParse({
    DB_POOL_MAX: envValue(env.DB_POOL_MAX),
    DB_IDLE_TIMEOUT_MS: envValue(env.DB_IDLE_TIMEOUT_MS)
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment: ${issues.join("; ")}`);
  }
  return { dbPoolMax: parsed.data.DB_POOL_MAX, dbIdleTimeoutMs: parsed.data.DB_IDLE_TIMEOUT_MS };
}

export function parsePipelineConfig(text: string, origin = CONFIG_FILE_NAME): PipelineConfig {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new Error(`${origin} is not valid YAML: ${describeError(error)}`);
  }

  const parsed = pipelineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`Invalid ${origin}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/** `PIPELINE_CONFIG`, else the first config file found in the working directory or the repository root. */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): string {
  const explicit = envValue(env.PIPELINE_CONFIG);
  if (explicit) {
    return resolve(cwd, explicit);
  }
  const candidates = [join(cwd, CONFIG_FILE_NAME), join(cwd, "../..", CONFIG_FILE_NAME)];
  const found = candidates.find((candidate) => existsSync(candidate));
  if (!found) {
    throw new Error(`No ${CONFIG_FILE_NAME} found in ${candidates.join(" or ")}; set PIPELINE_CONFIG`);
  }
  return found;
}

export function loadPipelineConfig(path: string): PipelineConfig {
  return parsePipelineConfig(readFileSync(path, "utf8"), path);
}

export function applyEnvOverrides(config: PipelineConfig, env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const strictValidation = envFlag(env.STRICT_VALIDATION);
  if (strictValidation === undefined) {
    return config;
  }
  return { ...config, ingestion: { ...config.ingestion, strictValidation } };
}

export function parseSourceList(value: string | undefined): SourceKind[] {
  const cleaned = envValue(value);
  if (!cleaned || cleaned.toLowerCase() === "all") {
    return [...SOURCE_KINDS];
  }
  const sources = cleaned
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
  const unknown = sources.filter((item) => !isSourceKind(item));
  if (unknown.length) {
    throw new Error(`Unknown source(s): ${unknown.join(", ")}; expected ${SOURCE_KINDS.join(", ")}`);
  }
  return [...new Set(sources.filter(isSourceKind))];
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): RuntimeConfig {
  const pipeline = applyEnvOverrides(loadPipelineConfig(resolveConfigPath(env, cwd)), env);
  const mode = envValue(env.INGESTION_MODE) ?? "streaming";
  if (mode !== "streaming" && mode !== "queue") {
    throw new Error(`INGESTION_MODE must be "streaming" or "queue", got "${mode}"`);
  }

  return {
    pipeline,
    databaseUrl: envValue(env.DATABASE_URL),
    logLevel: envValue(env.LOG_LEVEL) ?? "info",
    mode,
    redisUrl: envValue(env.REDIS_URL) ?? "redis://localhost:6379",
    queueName: envValue(env.INGESTION_QUEUE_NAME) ?? "ingestion",
    sources: parseSourceList(env.INGESTION_SOURCES),
    ...parseConnectionEnv(env)
  };
}

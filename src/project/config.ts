import fs from "node:fs";
import path from "node:path";
import { createJiti } from "jiti";
import type { ColumnNames } from "../core/types";

export interface LlmConfig {
  baseUrl: string;
  model: string;
  apiKey: string;
}

export interface AnalysisConfig {
  columns: ColumnNames;
  /** Default alert threshold, as a percentage of anomalous readings (0-5). */
  anomalyThresholdPercent: number;
  zScoreCutoff: number;
  /** Cap on summarize/critique passes, independent of the critic. */
  maxIterations: number;
  llm: LlmConfig;
  /** Directory, relative to the working directory, holding session state. */
  storeDir: string;
}

export const MAX_THRESHOLD_PERCENT = 5;

export const defaultAnalysisConfig: AnalysisConfig = {
  columns: {
    primary: "PM2.5 (µg/m³)",
    secondary: "PM10 (µg/m³)",
    timestamp: "Timestamp",
  },
  anomalyThresholdPercent: 1,
  zScoreCutoff: 3,
  maxIterations: 5,
  llm: {
    baseUrl: "http://localhost:11434/v1",
    model: "mistral:7b",
    apiKey: "ollama",
  },
  storeDir: ".airq",
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const nonEmptyString = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim().length > 0 ? value : undefined;

const numberIn = (
  value: unknown,
  min: number,
  max: number,
): number | undefined =>
  typeof value === "number" &&
  Number.isFinite(value) &&
  value >= min &&
  value <= max
    ? value
    : undefined;

const normalizeColumns = (raw: unknown): ColumnNames => {
  const defaults = defaultAnalysisConfig.columns;
  if (!isRecord(raw)) return defaults;
  return {
    primary: nonEmptyString(raw.primary) ?? defaults.primary,
    secondary: nonEmptyString(raw.secondary) ?? defaults.secondary,
    timestamp: nonEmptyString(raw.timestamp) ?? defaults.timestamp,
  };
};

const normalizeLlm = (raw: unknown): LlmConfig => {
  const defaults = defaultAnalysisConfig.llm;
  if (!isRecord(raw)) return defaults;
  return {
    baseUrl: nonEmptyString(raw.baseUrl) ?? defaults.baseUrl,
    model: nonEmptyString(raw.model) ?? defaults.model,
    apiKey: nonEmptyString(raw.apiKey) ?? defaults.apiKey,
  };
};

export const normalizeAnalysisConfig = (parsed: unknown): AnalysisConfig => {
  if (!isRecord(parsed)) {
    return defaultAnalysisConfig;
  }

  const maxIterations = numberIn(parsed.maxIterations, 1, 100);
  return {
    columns: normalizeColumns(parsed.columns),
    anomalyThresholdPercent:
      numberIn(parsed.anomalyThresholdPercent, 0, MAX_THRESHOLD_PERCENT) ??
      defaultAnalysisConfig.anomalyThresholdPercent,
    zScoreCutoff:
      numberIn(parsed.zScoreCutoff, 0, Number.MAX_VALUE) ??
      defaultAnalysisConfig.zScoreCutoff,
    maxIterations:
      maxIterations !== undefined && Number.isInteger(maxIterations)
        ? maxIterations
        : defaultAnalysisConfig.maxIterations,
    llm: normalizeLlm(parsed.llm),
    storeDir: nonEmptyString(parsed.storeDir) ?? defaultAnalysisConfig.storeDir,
  };
};

const applyEnvironment = (
  config: AnalysisConfig,
  env: NodeJS.ProcessEnv,
): AnalysisConfig => ({
  ...config,
  llm: {
    ...config.llm,
    baseUrl: nonEmptyString(env.AIRQ_LLM_BASE_URL) ?? config.llm.baseUrl,
    model: nonEmptyString(env.AIRQ_LLM_MODEL) ?? config.llm.model,
  },
});

const readConfigFile = async (cwd: string): Promise<unknown> => {
  const tsPath = path.join(cwd, ".airq", "config.ts");
  if (fs.existsSync(tsPath)) {
    const jiti = createJiti(import.meta.url);
    const loaded = await jiti.import(tsPath);
    return isRecord(loaded) && "default" in loaded
      ? (loaded.default ?? loaded)
      : loaded;
  }

  const jsonPath = path.join(cwd, ".airq", "config.json");
  if (!fs.existsSync(jsonPath)) {
    return undefined;
  }
  return JSON.parse(fs.readFileSync(jsonPath, "utf8")) as unknown;
};

/**
 * Loads `.airq/config.ts` or `.airq/config.json` from `cwd`. Fields that are
 * missing or of the wrong type fall back to their defaults one by one.
 */
export const loadAnalysisConfig = async (
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<AnalysisConfig> =>
  applyEnvironment(normalizeAnalysisConfig(await readConfigFile(cwd)), env);

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import {
  ConfigurationError,
  DEFAULT_QUALITY_CONFIG,
  DEFAULT_STYLE_CONFIG,
  ROSENBERG_REVERSE_ITEMS,
  resolveQualityConfig,
  resolveStyleConfig,
  type QualityScreenerConfig,
  type StyleCorrectorConfig,
} from "@response-quality/core";

export type EnvSource = Record<string, string | undefined>;

export interface AssessmentConfig {
  readonly quality: QualityScreenerConfig;
  readonly style: StyleCorrectorConfig;
  /** 0-based indices reverse-scored when a request brings none. */
  readonly reverseItems: readonly number[];
  readonly environment: string;
  readonly debugMode: boolean;
  readonly sentryDsn: string | null;
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);

const QUOTE_PAIRS = ['"', "'"];

const parseEnvLine = (line: string): readonly [string, string] | null => {
  const trimmed = line.trim();
  const separatorIndex = trimmed.indexOf("=");
  if (trimmed.startsWith("#") || separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  const value = trimmed.slice(separatorIndex + 1).trim();
  const quoted = QUOTE_PAIRS.some(
    (quote) => value.length >= 2 && value.startsWith(quote) && value.endsWith(quote)
  );

  return key.length > 0 ? [key, quoted ? value.slice(1, -1) : value] : null;
};

/** KEY=value pairs of a dotenv file; comments and malformed lines are dropped, later keys win. */
export const parseEnvFile = (raw: string): Map<string, string> => {
  const entries = raw
    .split(/\r?\n/)
    .map(parseEnvLine)
    .filter((entry): entry is readonly [string, string] => entry !== null);

  return new Map(entries);
};

export const findProjectEnvFile = (cwd: string): string | null => {
  const candidates = [resolve(cwd, ".env"), resolve(cwd, "..", ".env")];
  return candidates.find((path) => existsSync(path)) ?? null;
};

/**
 * Merges the first `.env` in `cwd` or its parent into `env`.
 * Variables already set keep their values. Returns the file used.
 */
export const loadProjectEnv = (
  cwd: string = process.cwd(),
  env: EnvSource = process.env
): string | null => {
  const envPath = findProjectEnvFile(cwd);
  if (envPath === null) {
    return null;
  }

  for (const [key, value] of parseEnvFile(readFileSync(envPath, "utf8"))) {
    env[key] ??= value;
  }

  return envPath;
};

const readEnv = (env: EnvSource, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

const readNumber = (env: EnvSource, key: string, fallback: number): number => {
  const raw = readEnv(env, key);
  if (raw === undefined) {
    return fallback;
  }

  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(key, `${key} must be a number, received "${raw}"`);
  }

  return parsed;
};

const readReverseItems = (env: EnvSource, itemCount: number): readonly number[] => {
  const raw = readEnv(env, "REVERSE_ITEMS");
  if (raw === undefined) {
    return ROSENBERG_REVERSE_ITEMS.filter((index) => index < itemCount);
  }

  const indices = raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      const index = /^\d+$/.test(part) ? Number(part) : Number.NaN;
      if (Number.isNaN(index) || index >= itemCount) {
        throw new ConfigurationError(
          "REVERSE_ITEMS",
          `REVERSE_ITEMS entries must be integers in [0, ${itemCount}), received "${part}"`
        );
      }
      return index;
    });

  return [...new Set(indices)].sort((a, b) => a - b);
};

/** Resolves thresholds from the environment; blank or unset variables keep the defaults. */
export const loadAssessmentConfig = (env: EnvSource = process.env): AssessmentConfig => {
  const quality = resolveQualityConfig({
    minTimePerItem: readNumber(
      env,
      "QUALITY_MIN_TIME_PER_ITEM",
      DEFAULT_QUALITY_CONFIG.minTimePerItem
    ),
    longstringThreshold: readNumber(
      env,
      "QUALITY_LONGSTRING_THRESHOLD",
      DEFAULT_QUALITY_CONFIG.longstringThreshold
    ),
    correlationThreshold: readNumber(
      env,
      "QUALITY_CORRELATION_THRESHOLD",
      DEFAULT_QUALITY_CONFIG.correlationThreshold
    ),
    mahalanobisPThreshold: readNumber(
      env,
      "QUALITY_MAHALANOBIS_P_THRESHOLD",
      DEFAULT_QUALITY_CONFIG.mahalanobisPThreshold
    ),
    varianceThreshold: readNumber(
      env,
      "QUALITY_VARIANCE_THRESHOLD",
      DEFAULT_QUALITY_CONFIG.varianceThreshold
    ),
    itemCount: readNumber(env, "QUALITY_ITEM_COUNT", DEFAULT_QUALITY_CONFIG.itemCount),
  });

  const style = resolveStyleConfig({
    extremeThreshold: readNumber(
      env,
      "STYLE_EXTREME_THRESHOLD",
      DEFAULT_STYLE_CONFIG.extremeThreshold
    ),
    midpointThreshold: readNumber(
      env,
      "STYLE_MIDPOINT_THRESHOLD",
      DEFAULT_STYLE_CONFIG.midpointThreshold
    ),
    acquiescenceThreshold: readNumber(
      env,
      "STYLE_ACQUIESCENCE_THRESHOLD",
      DEFAULT_STYLE_CONFIG.acquiescenceThreshold
    ),
  });

  return {
    quality,
    style,
    reverseItems: readReverseItems(env, quality.itemCount),
    environment: readEnv(env, "NODE_ENV") ?? "development",
    debugMode: TRUTHY.has((readEnv(env, "DEBUG_MODE") ?? "").toLowerCase()),
    sentryDsn: readEnv(env, "SENTRY_DSN") ?? null,
  };
};

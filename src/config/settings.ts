import { z } from "zod";
import { InvalidConfigurationError } from "../domain/errors";
import { toleranceBandSchema } from "../domain/schemas";
import type { ToleranceBand, ToleranceThresholds } from "../domain/types";
import { getString } from "../util/env";

export interface Settings {
  /** TTL for keys touching the current year or later */
  cacheTtlSeconds: number;
  /** TTL for keys about past years; Infinity keeps them for the process lifetime */
  historicalCacheTtlSeconds: number;
  requestTimeoutSeconds: number;
  maxRetries: number;
  /** Minimum delay between request starts against one source */
  requestDelaySeconds: number;
  maxConcurrentRequests: number;
  tolerance: ToleranceThresholds;
  defaultBand: ToleranceBand;
  /** Resolved forecasts a sector needs before HIGH confidence is allowed */
  minSampleSize: number;
}

export const DEFAULT_SETTINGS: Settings = {
  cacheTtlSeconds: 3600,
  historicalCacheTtlSeconds: Number.POSITIVE_INFINITY,
  requestTimeoutSeconds: 30,
  maxRetries: 3,
  requestDelaySeconds: 1,
  maxConcurrentRequests: 4,
  tolerance: { strict: 0.05, moderate: 0.15, loose: 0.25 },
  defaultBand: "moderate",
  minSampleSize: 5,
};

const thresholdSchema = z.number().gt(0).lte(1);

const settingsSchema = z.object({
  cacheTtlSeconds: z.number().positive(),
  historicalCacheTtlSeconds: z.number().positive(),
  requestTimeoutSeconds: z.number().positive().finite(),
  maxRetries: z.number().int().min(0).max(10),
  requestDelaySeconds: z.number().min(0).finite(),
  maxConcurrentRequests: z.number().int().min(1),
  tolerance: z
    .object({
      strict: thresholdSchema,
      moderate: thresholdSchema,
      loose: thresholdSchema,
    })
    .refine((t) => t.strict < t.moderate && t.moderate < t.loose, {
      message: "tolerance bands must satisfy strict < moderate < loose",
    }),
  defaultBand: toleranceBandSchema,
  minSampleSize: z.number().int().min(1),
});

function readNumber(name: string, fallback: number): number {
  const raw = getString(name);
  if (raw === undefined) return fallback;
  if (raw.toLowerCase() === "infinity") return Number.POSITIVE_INFINITY;
  // NaN is rejected by the schema with the variable name in the path
  return Number(raw);
}

/**
 * Validates a settings candidate. Throws InvalidConfigurationError listing
 * every offending field.
 */
export function validateSettings(candidate: unknown): Settings {
  const parsed = settingsSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "settings"}: ${issue.message}`
      )
    );
  }
  return parsed.data;
}

/**
 * Reads settings from the environment (stage-aware, see util/env) on top of
 * the documented defaults. Intended to run once at startup.
 */
export function loadSettings(overrides: Partial<Settings> = {}): Settings {
  const d = DEFAULT_SETTINGS;
  // the band stays a raw string here so validateSettings reports a bad value
  const fromEnv: Omit<Settings, "defaultBand"> & { defaultBand: string } = {
    cacheTtlSeconds: readNumber("CACHE_TTL_SECONDS", d.cacheTtlSeconds),
    historicalCacheTtlSeconds: readNumber(
      "HISTORICAL_CACHE_TTL_SECONDS",
      d.historicalCacheTtlSeconds
    ),
    requestTimeoutSeconds: readNumber(
      "REQUEST_TIMEOUT_SECONDS",
      d.requestTimeoutSeconds
    ),
    maxRetries: readNumber("MAX_RETRIES", d.maxRetries),
    requestDelaySeconds: readNumber(
      "REQUEST_DELAY_SECONDS",
      d.requestDelaySeconds
    ),
    maxConcurrentRequests: readNumber(
      "MAX_CONCURRENT_REQUESTS",
      d.maxConcurrentRequests
    ),
    tolerance: {
      strict: readNumber("TOLERANCE_STRICT", d.tolerance.strict),
      moderate: readNumber("TOLERANCE_MODERATE", d.tolerance.moderate),
      loose: readNumber("TOLERANCE_LOOSE", d.tolerance.loose),
    },
    defaultBand: getString("DEFAULT_TOLERANCE_BAND", d.defaultBand),
    minSampleSize: readNumber("MIN_SAMPLE_SIZE", d.minSampleSize),
  };
  return validateSettings({ ...fromEnv, ...overrides });
}

import { z } from "zod";
import { SECTORS, SOURCE_IDS } from "./types";

/**
 * Runtime schemas for records crossing a trust boundary (fetcher payloads,
 * bundled archives, handler input).
 */

export const sectorSchema = z.enum(SECTORS);

export const sourceIdSchema = z.enum(SOURCE_IDS);

export const toleranceBandSchema = z.enum(["strict", "moderate", "loose"]);

export const rawConfidenceSchema = z.enum(["low", "medium", "high"]);

export const yearSchema = z.number().int().min(1900).max(2200);

export const quantitySchema = z.object({
  value: z.number().finite(),
  unit: z.string(),
});

export const forecastRecordSchema = z.object({
  metric: z.string().min(1),
  predictedValue: quantitySchema,
  source: sourceIdSchema,
  sector: sectorSchema,
  forecastYear: yearSchema,
  targetYear: yearSchema,
  provenanceUrl: z.string().url(),
  rawConfidence: rawConfidenceSchema,
});

export const actualRecordSchema = z.object({
  metric: z.string().min(1),
  actualValue: quantitySchema,
  sector: sectorSchema,
  year: yearSchema,
  source: sourceIdSchema,
  provenanceUrl: z.string().url(),
});

export const predictionSchema = z.object({
  metric: z.string().min(1),
  targetValue: quantitySchema,
  currentProgress: quantitySchema,
  progressYear: yearSchema,
  source: sourceIdSchema,
  sector: sectorSchema,
  announcementYear: yearSchema,
  targetYear: yearSchema,
  provenanceUrl: z.string().url(),
  rawConfidence: rawConfidenceSchema,
});

/** Comma-separated query-string list, e.g. "Energy,Economy". */
export function csvList<T extends z.ZodTypeAny>(item: T) {
  return z
    .string()
    .transform((raw) =>
      raw
        .split(",")
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
    )
    .pipe(z.array(item).min(1));
}

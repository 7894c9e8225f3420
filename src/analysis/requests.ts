import { z } from "zod";
import {
  csvList,
  sectorSchema,
  sourceIdSchema,
  toleranceBandSchema,
  yearSchema,
} from "../domain/schemas";
import { fail, ok, type Result } from "../domain/result";
import { SECTORS, type Sector, type SourceId, type ToleranceBand } from "../domain/types";
import type { SourceRegistry } from "../sources/registry";
import { steppedWindows, type EvaluationWindow } from "./plan_periods";

/**
 * Query-string input for the two workflows. Everything arrives as strings.
 */

const queryYear = z.coerce.number().pipe(yearSchema);

const evaluateQuerySchema = z
  .object({
    forecastYear: queryYear,
    targetYear: queryYear,
    sectors: csvList(sectorSchema).optional(),
    sources: csvList(sourceIdSchema).optional(),
    band: toleranceBandSchema.optional(),
  })
  .refine((q) => q.targetYear > q.forecastYear, {
    message: "targetYear must be after forecastYear",
    path: ["targetYear"],
  });

const assessQuerySchema = z.object({
  targetYear: queryYear,
  sectors: csvList(sectorSchema).optional(),
  sources: csvList(sourceIdSchema).optional(),
  band: toleranceBandSchema.optional(),
  historyFrom: queryYear.optional(),
  historyStep: z.coerce.number().int().min(1).max(50).optional(),
});

export type QueryParams = Record<string, string | undefined> | null | undefined;

export interface EvaluateRequest {
  forecastYear: number;
  targetYear: number;
  sectors: Sector[];
  sources: SourceId[];
  band: ToleranceBand;
}

export interface AssessRequest {
  targetYear: number;
  sectors: Sector[];
  sources: SourceId[];
  band: ToleranceBand;
  /** Undefined means the default Five Year Plan windows */
  historyWindows?: EvaluationWindow[];
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "query"}: ${i.message}`);
}

function present(params: QueryParams): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(params ?? {})) {
    if (value !== undefined && value.trim() !== "") out[key] = value.trim();
  }
  return out;
}

export function parseEvaluateRequest(
  params: QueryParams,
  defaults: { band: ToleranceBand; registry: SourceRegistry }
): Result<EvaluateRequest, string[]> {
  const parsed = evaluateQuerySchema.safeParse(present(params));
  if (!parsed.success) return fail(issuesOf(parsed.error));
  const q = parsed.data;
  return ok({
    forecastYear: q.forecastYear,
    targetYear: q.targetYear,
    sectors: q.sectors ?? [...SECTORS],
    sources: q.sources ?? defaults.registry.withCapability("historical"),
    band: q.band ?? defaults.band,
  });
}

export function parseAssessRequest(
  params: QueryParams,
  defaults: { band: ToleranceBand; registry: SourceRegistry; nowYear: number }
): Result<AssessRequest, string[]> {
  const parsed = assessQuerySchema.safeParse(present(params));
  if (!parsed.success) return fail(issuesOf(parsed.error));
  const q = parsed.data;

  const sources =
    q.sources ??
    Array.from(
      new Set([
        ...defaults.registry.withCapability("current"),
        ...defaults.registry.withCapability("historical"),
      ])
    ).sort((a, b) => a.localeCompare(b));

  let historyWindows: EvaluationWindow[] | undefined;
  if (q.historyFrom !== undefined || q.historyStep !== undefined) {
    if (q.historyFrom === undefined) {
      return fail(["historyFrom: required when historyStep is given"]);
    }
    historyWindows = steppedWindows(q.historyFrom, q.historyStep ?? 5, defaults.nowYear);
  }

  return ok({
    targetYear: q.targetYear,
    sectors: q.sectors ?? [...SECTORS],
    sources,
    band: q.band ?? defaults.band,
    historyWindows,
  });
}

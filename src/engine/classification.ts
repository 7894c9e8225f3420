import { DEFAULT_SETTINGS } from "../config/settings";
import { ContractViolationError } from "../domain/errors";
import { normalizeMetric, normalizeQuantity } from "../domain/quantity";
import {
  SECTORS,
  type ActualRecord,
  type ClassificationResult,
  type ClassificationStatus,
  type ForecastRecord,
  type HistoricalStats,
  type Sector,
  type SectorStats,
  type ToleranceBand,
  type ToleranceThresholds,
} from "../domain/types";
import { defaultSourceRegistry, type SourceRegistry } from "../sources/registry";

export const DEFAULT_THRESHOLDS: ToleranceThresholds = DEFAULT_SETTINGS.tolerance;

// absorbs binary floating point error at the band boundary
const BOUNDARY_EPSILON = 1e-9;

/**
 * Signed (actual - predicted) / |predicted|. Positive means the realised value
 * exceeded the forecast.
 */
export function deviationRatio(forecast: ForecastRecord, actual: ActualRecord): number {
  const predicted = normalizeQuantity(forecast.predictedValue);
  const realised = normalizeQuantity(actual.actualValue);
  if (predicted.value === 0) {
    throw new ContractViolationError(
      `Forecast "${forecast.metric}" has a zero predicted value`
    );
  }
  if (predicted.unit !== realised.unit) {
    throw new ContractViolationError(
      `Unit mismatch for "${forecast.metric}": ${predicted.unit} vs ${realised.unit}`
    );
  }
  return (realised.value - predicted.value) / Math.abs(predicted.value);
}

export function statusForDeviation(
  deviation: number,
  threshold: number
): Exclude<ClassificationStatus, "UNRESOLVED"> {
  if (Math.abs(deviation) <= threshold + BOUNDARY_EPSILON) return "ON_TIME";
  return deviation > 0 ? "EARLY" : "LATE";
}

export function classify(
  forecast: ForecastRecord,
  actual: ActualRecord | null,
  band: ToleranceBand,
  thresholds: ToleranceThresholds = DEFAULT_THRESHOLDS
): ClassificationResult {
  if (actual === null) {
    return {
      forecast,
      actual: null,
      status: "UNRESOLVED",
      deviationRatio: null,
      toleranceBand: band,
    };
  }
  const deviation = deviationRatio(forecast, actual);
  return {
    forecast,
    actual,
    status: statusForDeviation(deviation, thresholds[band]),
    deviationRatio: deviation,
    toleranceBand: band,
  };
}

/**
 * Best actual for a forecast: same sector, normalised metric and unit, and the
 * forecast's target year. Ties go to the most trusted source, then source id,
 * then provenance URL. A forecast of zero has no deviation ratio and never
 * matches, so it stays UNRESOLVED.
 */
export function matchActual(
  forecast: ForecastRecord,
  actuals: readonly ActualRecord[],
  registry: SourceRegistry = defaultSourceRegistry
): ActualRecord | null {
  const predicted = normalizeQuantity(forecast.predictedValue);
  if (predicted.value === 0) return null;
  const metric = normalizeMetric(forecast.metric);
  const { unit } = predicted;

  const candidates = actuals.filter(
    (a) =>
      a.sector === forecast.sector &&
      a.year === forecast.targetYear &&
      normalizeMetric(a.metric) === metric &&
      normalizeQuantity(a.actualValue).unit === unit
  );
  if (candidates.length === 0) return null;

  return [...candidates].sort(
    (a, b) =>
      registry.trustTier(a.source) - registry.trustTier(b.source) ||
      a.source.localeCompare(b.source) ||
      a.provenanceUrl.localeCompare(b.provenanceUrl)
  )[0];
}

export type BySector<T> = Partial<Record<Sector, T[]>>;

export interface ClassifyAllOptions {
  thresholds?: ToleranceThresholds;
  registry?: SourceRegistry;
}

/**
 * Classifies every forecast against its best-matching actual. Sectors follow
 * the canonical sector order; forecasts keep their input order.
 */
export function classifyAll(
  forecastsBySector: BySector<ForecastRecord>,
  actualsBySector: BySector<ActualRecord>,
  band: ToleranceBand,
  options: ClassifyAllOptions = {}
): BySector<ClassificationResult> {
  const results: BySector<ClassificationResult> = {};
  for (const sector of SECTORS) {
    const forecasts = forecastsBySector[sector];
    if (!forecasts) continue;
    const actuals = actualsBySector[sector] ?? [];
    results[sector] = forecasts.map((forecast) =>
      classify(
        forecast,
        matchActual(forecast, actuals, options.registry),
        band,
        options.thresholds
      )
    );
  }
  return results;
}

export function computeSectorStats(
  resultsBySector: BySector<ClassificationResult>
): HistoricalStats {
  const stats: HistoricalStats = {};
  for (const sector of SECTORS) {
    const results = resultsBySector[sector];
    if (!results) continue;
    const tally = tallyStatuses({ [sector]: results });
    const sampleSize = tally.EARLY + tally.ON_TIME + tally.LATE;
    const entry: SectorStats = {
      sector,
      sampleSize,
      early: tally.EARLY,
      onTime: tally.ON_TIME,
      late: tally.LATE,
      unresolved: tally.UNRESOLVED,
      accuracyRate:
        sampleSize > 0 ? (tally.EARLY + tally.ON_TIME) / sampleSize : null,
    };
    stats[sector] = entry;
  }
  return stats;
}

/**
 * Merges stats from several evaluation windows, summing per-sector counts.
 */
export function mergeSectorStats(parts: readonly HistoricalStats[]): HistoricalStats {
  const merged: HistoricalStats = {};
  for (const part of parts) {
    for (const sector of SECTORS) {
      const next = part[sector];
      if (!next) continue;
      const prev = merged[sector];
      const early = (prev?.early ?? 0) + next.early;
      const onTime = (prev?.onTime ?? 0) + next.onTime;
      const late = (prev?.late ?? 0) + next.late;
      const sampleSize = early + onTime + late;
      merged[sector] = {
        sector,
        sampleSize,
        early,
        onTime,
        late,
        unresolved: (prev?.unresolved ?? 0) + next.unresolved,
        accuracyRate: sampleSize > 0 ? (early + onTime) / sampleSize : null,
      };
    }
  }
  return merged;
}

export function tallyStatuses(
  resultsBySector: BySector<ClassificationResult>
): Record<ClassificationStatus, number> {
  const counts: Record<ClassificationStatus, number> = {
    EARLY: 0,
    ON_TIME: 0,
    LATE: 0,
    UNRESOLVED: 0,
  };
  for (const sector of SECTORS) {
    for (const result of resultsBySector[sector] ?? []) {
      counts[result.status] += 1;
    }
  }
  return counts;
}

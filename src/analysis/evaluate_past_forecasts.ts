import {
  classifyAll,
  computeSectorStats,
  tallyStatuses,
  type BySector,
} from "../engine/classification";
import type {
  ClassificationResult,
  ClassificationStatus,
  FetchFailure,
  HistoricalStats,
  Sector,
  SourceId,
  ToleranceBand,
  ToleranceThresholds,
} from "../domain/types";
import type { BatchOptions, FetchOrchestrator } from "../orchestrator/fetch_orchestrator";
import type { SourceRegistry } from "../sources/registry";
import { getLogger } from "../util/logger";

export interface EvaluatePastForecastsInput {
  forecastYear: number;
  targetYear: number;
  sectors: readonly Sector[];
  sources: readonly SourceId[];
  band: ToleranceBand;
  thresholds?: ToleranceThresholds;
}

export interface PastForecastEvaluation {
  forecastYear: number;
  targetYear: number;
  band: ToleranceBand;
  results: BySector<ClassificationResult>;
  stats: HistoricalStats;
  tally: Record<ClassificationStatus, number>;
  failures: FetchFailure[];
}

export interface AnalysisDeps {
  orchestrator: FetchOrchestrator;
  registry?: SourceRegistry;
}

/**
 * "What did forecasts made in `forecastYear` say about `targetYear`, and what
 * actually happened?"
 */
export async function evaluatePastForecasts(
  input: EvaluatePastForecastsInput,
  deps: AnalysisDeps,
  options: BatchOptions = {}
): Promise<PastForecastEvaluation> {
  const logger = getLogger("analysis/evaluate_past_forecasts");
  const { forecastYear, targetYear, sectors, sources, band } = input;

  const [forecasts, actuals] = await Promise.all([
    deps.orchestrator.fetchHistoricalForecasts(
      forecastYear,
      targetYear,
      sectors,
      sources,
      options
    ),
    deps.orchestrator.fetchActualOutcomes(targetYear, sectors, options),
  ]);

  const results = classifyAll(forecasts.records, actuals.records, band, {
    thresholds: input.thresholds,
    registry: deps.registry,
  });
  const tally = tallyStatuses(results);

  logger.debug(
    { forecastYear, targetYear, band, tally },
    "Classified past forecasts"
  );

  return {
    forecastYear,
    targetYear,
    band,
    results,
    stats: computeSectorStats(results),
    tally,
    failures: [...forecasts.failures, ...actuals.failures],
  };
}

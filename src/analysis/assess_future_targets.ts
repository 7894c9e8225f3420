import { InvalidPredictionError } from "../domain/errors";
import type {
  FetchFailure,
  HistoricalStats,
  LikelihoodAssessment,
  Outlook,
  Prediction,
  Sector,
  SectorOutlook,
  SourceId,
  ToleranceBand,
  ToleranceThresholds,
} from "../domain/types";
import { SECTORS } from "../domain/types";
import { mergeSectorStats, type BySector } from "../engine/classification";
import {
  analyzeFutureLikelihood,
  summarizeSector,
  tallyOutlooks,
  type LikelihoodOptions,
} from "../engine/likelihood";
import type { BatchOptions } from "../orchestrator/fetch_orchestrator";
import { currentYear, systemClock } from "../util/clock";
import { getLogger } from "../util/logger";
import { evaluatePastForecasts, type AnalysisDeps } from "./evaluate_past_forecasts";
import { planWindows, type EvaluationWindow } from "./plan_periods";

export interface AssessFutureTargetsInput {
  targetYear: number;
  sectors: readonly Sector[];
  sources: readonly SourceId[];
  /** Past windows feeding the sector history; defaults to the Five Year Plans */
  historyWindows?: readonly EvaluationWindow[];
  band: ToleranceBand;
  thresholds?: ToleranceThresholds;
}

export interface RejectedPrediction {
  prediction: Prediction;
  reason: string;
}

export interface FutureTargetAssessment {
  targetYear: number;
  assessments: BySector<LikelihoodAssessment>;
  rejected: RejectedPrediction[];
  historicalStats: HistoricalStats;
  sectorOutlooks: Partial<Record<Sector, SectorOutlook>>;
  outlookTally: Record<Outlook, number>;
  failures: FetchFailure[];
}

/**
 * "How likely is each current target for `targetYear` to be met?" Sector
 * history comes from classifying past windows with the same sources.
 */
export async function assessFutureTargets(
  input: AssessFutureTargetsInput,
  deps: AnalysisDeps,
  options: BatchOptions & Omit<LikelihoodOptions, "catalog"> = {}
): Promise<FutureTargetAssessment> {
  const logger = getLogger("analysis/assess_future_targets");
  const clock = options.clock ?? systemClock;
  const windows = input.historyWindows ?? planWindows(currentYear(clock));
  const batch: BatchOptions = { signal: options.signal };

  const [current, history] = await Promise.all([
    deps.orchestrator.fetchCurrentPredictions(
      input.targetYear,
      input.sectors,
      input.sources,
      batch
    ),
    Promise.all(
      windows.map((window) =>
        evaluatePastForecasts(
          {
            forecastYear: window.forecastYear,
            targetYear: window.targetYear,
            sectors: input.sectors,
            sources: input.sources,
            band: input.band,
            thresholds: input.thresholds,
          },
          deps,
          batch
        )
      )
    ),
  ]);

  const historicalStats = mergeSectorStats(history.map((h) => h.stats));
  const assessments: BySector<LikelihoodAssessment> = {};
  const sectorOutlooks: Partial<Record<Sector, SectorOutlook>> = {};
  const rejected: RejectedPrediction[] = [];
  const horizonYears = input.targetYear - currentYear(clock);

  for (const sector of SECTORS) {
    const predictions = current.records[sector];
    if (!predictions) continue;
    const scored: LikelihoodAssessment[] = [];
    for (const prediction of predictions) {
      try {
        scored.push(
          analyzeFutureLikelihood(prediction, historicalStats, {
            clock,
            minSampleSize: options.minSampleSize,
            steepness: options.steepness,
          })
        );
      } catch (error) {
        if (!(error instanceof InvalidPredictionError)) throw error;
        logger.warn(
          { metric: prediction.metric, source: prediction.source, reason: error.reason },
          "Prediction rejected"
        );
        rejected.push({ prediction, reason: error.reason });
      }
    }
    assessments[sector] = scored;
    sectorOutlooks[sector] = summarizeSector(sector, scored, horizonYears);
  }

  return {
    targetYear: input.targetYear,
    assessments,
    rejected,
    historicalStats,
    sectorOutlooks,
    outlookTally: tallyOutlooks(assessments),
    failures: [...current.failures, ...history.flatMap((h) => h.failures)],
  };
}

import { DEFAULT_SETTINGS } from "../config/settings";
import { InvalidPredictionError } from "../domain/errors";
import { normalizeQuantity } from "../domain/quantity";
import {
  SECTORS,
  type ConfidenceLevel,
  type HistoricalStats,
  type LikelihoodAssessment,
  type Outlook,
  type Prediction,
  type Sector,
  type SectorOutlook,
} from "../domain/types";
import { defaultMetricCatalog, type MetricCatalog } from "../sources/metric_catalog";
import { currentYear, systemClock, type Clock } from "../util/clock";

export const DEFAULT_STEEPNESS = 6;

// schedule gap beyond which a target counts as ahead of or behind plan
const OUTLOOK_MARGIN = 0.1;

export interface LikelihoodOptions {
  clock?: Clock;
  /** Resolved forecasts a sector needs before HIGH confidence is allowed */
  minSampleSize?: number;
  /** k in the logistic baseline */
  steepness?: number;
  catalog?: MetricCatalog;
}

function clamp(value: number, min = 0, max = 1): number {
  return Math.min(max, Math.max(min, value));
}

function pct(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/**
 * Boundary check for predictions entering the engine.
 */
export function validatePrediction(prediction: Prediction): void {
  const target = normalizeQuantity(prediction.targetValue);
  const progress = normalizeQuantity(prediction.currentProgress);
  if (target.value === 0) {
    throw new InvalidPredictionError(prediction.metric, "target value is zero");
  }
  if (prediction.targetYear <= prediction.announcementYear) {
    throw new InvalidPredictionError(
      prediction.metric,
      `target year ${prediction.targetYear} is not after announcement year ${prediction.announcementYear}`
    );
  }
  if (target.unit !== progress.unit) {
    throw new InvalidPredictionError(
      prediction.metric,
      `progress unit "${progress.unit}" does not match target unit "${target.unit}"`
    );
  }
}

export function progressRatio(prediction: Prediction): number {
  return (
    normalizeQuantity(prediction.currentProgress).value /
    normalizeQuantity(prediction.targetValue).value
  );
}

export function timeRatio(prediction: Prediction, nowYear: number): number {
  const span = prediction.targetYear - prediction.announcementYear;
  return clamp((nowYear - prediction.announcementYear) / span);
}

/** Logistic in the schedule gap; 0.5 when exactly on schedule. */
export function baselineProbability(
  scheduleGap: number,
  steepness = DEFAULT_STEEPNESS
): number {
  return 1 / (1 + Math.exp(-steepness * scheduleGap));
}

export function confidenceFor(
  probability: number,
  sampleSize: number,
  minSampleSize: number
): ConfidenceLevel {
  const sparse = sampleSize < minSampleSize;
  if (probability > 0.8 && !sparse) return "high";
  if (probability >= 0.6 && probability <= 0.8) return "medium";
  if (sparse && probability > 0.6) return "medium";
  return "low";
}

export function outlookFor(
  scheduleGap: number,
  progress: number,
  nowYear: number,
  targetYear: number
): Outlook {
  if (nowYear >= targetYear && progress < 1) return "LATE_RISK";
  if (scheduleGap > OUTLOOK_MARGIN) return "LIKELY_EARLY";
  if (Math.abs(scheduleGap) <= OUTLOOK_MARGIN) return "ON_TIME";
  return "LATE_RISK";
}

/**
 * Probability that an open target is met on time, from its progress against
 * the elapsed window and the sector's record of past forecasts.
 */
export function analyzeFutureLikelihood(
  prediction: Prediction,
  historicalStats: HistoricalStats,
  options: LikelihoodOptions = {}
): LikelihoodAssessment {
  validatePrediction(prediction);

  const nowYear = currentYear(options.clock ?? systemClock);
  const minSampleSize = options.minSampleSize ?? DEFAULT_SETTINGS.minSampleSize;
  const catalog = options.catalog ?? defaultMetricCatalog;
  const { sector } = prediction;

  const progress = progressRatio(prediction);
  const elapsed = timeRatio(prediction, nowYear);
  const gap = progress - elapsed;
  const baseline = baselineProbability(gap, options.steepness);

  const stats = historicalStats[sector];
  const sampleSize = stats?.sampleSize ?? 0;
  const observedRate = stats?.accuracyRate ?? null;
  const rate = observedRate ?? catalog.forSector(sector).accuracyPrior;

  const probability = clamp(baseline * (0.5 + 0.5 * rate));

  const scheduleFactor = {
    effect: Math.abs(baseline - 0.5),
    text:
      `Progress at ${pct(progress)} of target with ${pct(elapsed)} of the window elapsed ` +
      `(${gap >= 0 ? "ahead of" : "behind"} schedule by ${pct(Math.abs(gap))})`,
  };
  const historyFactor = {
    effect: Math.abs(probability - baseline),
    text:
      observedRate !== null
        ? `${sector} forecasts resolved early or on time in ${pct(observedRate)} of ${sampleSize} cases`
        : `No resolved ${sector} forecasts; using sector prior of ${pct(rate)}`,
  };
  const factors = [scheduleFactor, historyFactor].sort(
    (a, b) => b.effect - a.effect
  );

  const span = prediction.targetYear - prediction.announcementYear;
  const yearsElapsed = Math.min(
    span,
    Math.max(0, nowYear - prediction.announcementYear)
  );
  const closingNote =
    sampleSize < minSampleSize
      ? `Only ${sampleSize} resolved ${sector} forecasts (fewer than ${minSampleSize}); confidence is limited`
      : `${yearsElapsed} of ${span} years elapsed since announcement in ${prediction.announcementYear}`;

  return {
    prediction,
    probability,
    confidence: confidenceFor(probability, sampleSize, minSampleSize),
    outlook: outlookFor(gap, progress, nowYear, prediction.targetYear),
    rationale: [...factors.map((f) => f.text), closingNote],
  };
}

export function tallyOutlooks(
  assessmentsBySector: Partial<Record<Sector, LikelihoodAssessment[]>>
): Record<Outlook, number> {
  const counts: Record<Outlook, number> = {
    LIKELY_EARLY: 0,
    ON_TIME: 0,
    LATE_RISK: 0,
  };
  for (const sector of SECTORS) {
    for (const assessment of assessmentsBySector[sector] ?? []) {
      counts[assessment.outlook] += 1;
    }
  }
  return counts;
}

const OUTLOOK_SCORE: Record<Outlook, number> = {
  LIKELY_EARLY: 1,
  ON_TIME: 0,
  LATE_RISK: -1,
};

// mean outlook score beyond which a sector leans early or late
const SECTOR_LEAN = 0.3;

/**
 * Sector-level outlook and confidence. The outlook is the mean of +1 / 0 / -1
 * per assessment. The confidence score starts from the mean probability and
 * gains up to 0.1 for the number of targets (full at five) and up to 0.1 for
 * a near horizon (nothing at twenty years or more).
 */
export function summarizeSector(
  sector: Sector,
  assessments: readonly LikelihoodAssessment[],
  horizonYears: number
): SectorOutlook {
  const count = assessments.length;
  if (count === 0) {
    return { sector, outlook: "ON_TIME", confidenceScore: 0, predictionCount: 0 };
  }

  const lean =
    assessments.reduce((sum, a) => sum + OUTLOOK_SCORE[a.outlook], 0) / count;
  const outlook: Outlook =
    lean > SECTOR_LEAN ? "LIKELY_EARLY" : lean < -SECTOR_LEAN ? "LATE_RISK" : "ON_TIME";

  const meanProbability =
    assessments.reduce((sum, a) => sum + a.probability, 0) / count;
  const countFactor = Math.min(1, count / 5) * 0.1;
  const horizonFactor = clamp(1 - Math.max(0, horizonYears) / 20) * 0.1;

  return {
    sector,
    outlook,
    confidenceScore: clamp(meanProbability + countFactor + horizonFactor),
    predictionCount: count,
  };
}

import type {
  ActualRecord,
  ClassificationResult,
  ClassificationStatus,
  FetchFailure,
  ForecastRecord,
  LikelihoodAssessment,
  Outlook,
  Prediction,
  Quantity,
  Sector,
  SectorOutlook,
  SectorStats,
} from "../domain/types";
import { SECTORS } from "../domain/types";
import type { FutureTargetAssessment } from "./assess_future_targets";
import { CitationRegistry, type Citation } from "./citations";
import type { PastForecastEvaluation } from "./evaluate_past_forecasts";

/**
 * JSON output contract. Field names are snake_case; every record carries the
 * citation tag of its provenance URL.
 */

export type WireQuantity = Quantity;

export interface WireForecast {
  metric: string;
  predicted_value: WireQuantity;
  source: string;
  sector: Sector;
  forecast_year: number;
  target_year: number;
  provenance_url: string;
  raw_confidence: string;
  citation: string;
}

export interface WireActual {
  metric: string;
  actual_value: WireQuantity;
  sector: Sector;
  year: number;
  source: string;
  provenance_url: string;
  citation: string;
}

export interface WireClassification {
  forecast: WireForecast;
  actual: WireActual | null;
  status: ClassificationStatus;
  deviation_ratio: number | null;
  tolerance_band: string;
}

export interface WirePrediction {
  metric: string;
  target_value: WireQuantity;
  current_progress: WireQuantity;
  progress_year: number;
  source: string;
  sector: Sector;
  announcement_year: number;
  target_year: number;
  provenance_url: string;
  raw_confidence: string;
  citation: string;
}

export interface WireAssessment {
  prediction: WirePrediction;
  probability: number;
  confidence: string;
  outlook: Outlook;
  rationale: string[];
}

export interface WireSectorStats {
  sample_size: number;
  early: number;
  on_time: number;
  late: number;
  unresolved: number;
  accuracy_rate: number | null;
}

export interface WireSectorOutlook {
  outlook: Outlook;
  confidence_score: number;
  prediction_count: number;
}

export interface WireFailure {
  operation: string;
  sector: Sector;
  source: string;
  kind: string;
  message: string;
}

function quantity(q: Quantity): WireQuantity {
  return { value: q.value, unit: q.unit };
}

function wireForecast(f: ForecastRecord, citations: CitationRegistry): WireForecast {
  return {
    metric: f.metric,
    predicted_value: quantity(f.predictedValue),
    source: f.source,
    sector: f.sector,
    forecast_year: f.forecastYear,
    target_year: f.targetYear,
    provenance_url: f.provenanceUrl,
    raw_confidence: f.rawConfidence,
    citation: citations.add(f.provenanceUrl),
  };
}

function wireActual(a: ActualRecord, citations: CitationRegistry): WireActual {
  return {
    metric: a.metric,
    actual_value: quantity(a.actualValue),
    sector: a.sector,
    year: a.year,
    source: a.source,
    provenance_url: a.provenanceUrl,
    citation: citations.add(a.provenanceUrl),
  };
}

function wirePrediction(p: Prediction, citations: CitationRegistry): WirePrediction {
  return {
    metric: p.metric,
    target_value: quantity(p.targetValue),
    current_progress: quantity(p.currentProgress),
    progress_year: p.progressYear,
    source: p.source,
    sector: p.sector,
    announcement_year: p.announcementYear,
    target_year: p.targetYear,
    provenance_url: p.provenanceUrl,
    raw_confidence: p.rawConfidence,
    citation: citations.add(p.provenanceUrl),
  };
}

export function toWireClassification(
  result: ClassificationResult,
  citations = new CitationRegistry()
): WireClassification {
  return {
    forecast: wireForecast(result.forecast, citations),
    actual: result.actual ? wireActual(result.actual, citations) : null,
    status: result.status,
    deviation_ratio: result.deviationRatio,
    tolerance_band: result.toleranceBand,
  };
}

export function toWireAssessment(
  assessment: LikelihoodAssessment,
  citations = new CitationRegistry()
): WireAssessment {
  return {
    prediction: wirePrediction(assessment.prediction, citations),
    probability: assessment.probability,
    confidence: assessment.confidence,
    outlook: assessment.outlook,
    rationale: [...assessment.rationale],
  };
}

function toWireStats(stats: SectorStats): WireSectorStats {
  return {
    sample_size: stats.sampleSize,
    early: stats.early,
    on_time: stats.onTime,
    late: stats.late,
    unresolved: stats.unresolved,
    accuracy_rate: stats.accuracyRate,
  };
}

function toWireSectorOutlook(summary: SectorOutlook): WireSectorOutlook {
  return {
    outlook: summary.outlook,
    confidence_score: summary.confidenceScore,
    prediction_count: summary.predictionCount,
  };
}

function mapSectors<T, R>(
  bySector: Partial<Record<Sector, T>>,
  fn: (value: T) => R
): Partial<Record<Sector, R>> {
  const out: Partial<Record<Sector, R>> = {};
  for (const sector of SECTORS) {
    const value = bySector[sector];
    if (value !== undefined) out[sector] = fn(value);
  }
  return out;
}

function toWireFailure(f: FetchFailure): WireFailure {
  return { ...f };
}

export interface WireEvaluation {
  forecast_year: number;
  target_year: number;
  tolerance_band: string;
  results: Partial<Record<Sector, WireClassification[]>>;
  sector_stats: Partial<Record<Sector, WireSectorStats>>;
  status_counts: Record<ClassificationStatus, number>;
  failures: WireFailure[];
  citations: Citation[];
}

export function toWireEvaluation(report: PastForecastEvaluation): WireEvaluation {
  const citations = new CitationRegistry();
  return {
    forecast_year: report.forecastYear,
    target_year: report.targetYear,
    tolerance_band: report.band,
    results: mapSectors(report.results, (list) =>
      list.map((r) => toWireClassification(r, citations))
    ),
    sector_stats: mapSectors(report.stats, toWireStats),
    status_counts: { ...report.tally },
    failures: report.failures.map(toWireFailure),
    citations: citations.render(),
  };
}

export interface WireTargetAssessment {
  target_year: number;
  assessments: Partial<Record<Sector, WireAssessment[]>>;
  rejected: Array<{ prediction: WirePrediction; reason: string }>;
  sector_stats: Partial<Record<Sector, WireSectorStats>>;
  sector_outlooks: Partial<Record<Sector, WireSectorOutlook>>;
  outlook_counts: Record<Outlook, number>;
  failures: WireFailure[];
  citations: Citation[];
}

export function toWireTargetAssessment(
  report: FutureTargetAssessment
): WireTargetAssessment {
  const citations = new CitationRegistry();
  return {
    target_year: report.targetYear,
    assessments: mapSectors(report.assessments, (list) =>
      list.map((a) => toWireAssessment(a, citations))
    ),
    rejected: report.rejected.map((r) => ({
      prediction: wirePrediction(r.prediction, citations),
      reason: r.reason,
    })),
    sector_stats: mapSectors(report.historicalStats, toWireStats),
    sector_outlooks: mapSectors(report.sectorOutlooks, toWireSectorOutlook),
    outlook_counts: { ...report.outlookTally },
    failures: report.failures.map(toWireFailure),
    citations: citations.render(),
  };
}

/**
 * Domain types shared by fetchers, the orchestrator and the engines.
 */

export const SECTORS = [
  "Economy",
  "Energy",
  "Infrastructure",
  "Technology",
  "Agriculture",
  "Education",
  "Healthcare",
  "Environment",
  "Social Development",
] as const;

export type Sector = (typeof SECTORS)[number];

export const SOURCE_IDS = [
  "rbi",
  "mospi",
  "niti-aayog",
  "pib",
  "planning-commission",
  "morth",
  "mnre",
  "world-bank",
  "iea",
  "un-desa",
  "economic-times",
  "the-hindu",
  "mint",
  "reuters",
] as const;

export type SourceId = (typeof SOURCE_IDS)[number];

export type RawConfidence = "low" | "medium" | "high";

export type ToleranceBand = "strict" | "moderate" | "loose";

export type ToleranceThresholds = Record<ToleranceBand, number>;

/** A measured or targeted amount; scale words are already folded into `value`. */
export interface Quantity {
  value: number;
  unit: string;
}

export interface ForecastRecord {
  metric: string;
  predictedValue: Quantity;
  source: SourceId;
  sector: Sector;
  /** Year the forecast was published */
  forecastYear: number;
  /** Year the forecast is about */
  targetYear: number;
  provenanceUrl: string;
  rawConfidence: RawConfidence;
}

export interface ActualRecord {
  metric: string;
  actualValue: Quantity;
  sector: Sector;
  year: number;
  source: SourceId;
  provenanceUrl: string;
}

/** An open target: announced in `announcementYear`, due in `targetYear`. */
export interface Prediction {
  metric: string;
  targetValue: Quantity;
  currentProgress: Quantity;
  /** Year the progress figure refers to */
  progressYear: number;
  source: SourceId;
  sector: Sector;
  announcementYear: number;
  targetYear: number;
  provenanceUrl: string;
  rawConfidence: RawConfidence;
}

export type ClassificationStatus = "EARLY" | "ON_TIME" | "LATE" | "UNRESOLVED";

export interface ClassificationResult {
  forecast: ForecastRecord;
  actual: ActualRecord | null;
  status: ClassificationStatus;
  /** Signed, null exactly when status is UNRESOLVED */
  deviationRatio: number | null;
  toleranceBand: ToleranceBand;
}

export interface SectorStats {
  sector: Sector;
  /** Resolved (EARLY, ON_TIME or LATE) results */
  sampleSize: number;
  early: number;
  onTime: number;
  late: number;
  unresolved: number;
  /** (early + onTime) / sampleSize, null when nothing resolved */
  accuracyRate: number | null;
}

export type HistoricalStats = Partial<Record<Sector, SectorStats>>;

export type ConfidenceLevel = "low" | "medium" | "high";

/** Derived label for open targets only. */
export type Outlook = "LIKELY_EARLY" | "ON_TIME" | "LATE_RISK";

export interface LikelihoodAssessment {
  prediction: Prediction;
  probability: number;
  confidence: ConfidenceLevel;
  outlook: Outlook;
  rationale: string[];
}

export type FetchOperation = "historical" | "actual" | "current";

export type FetchFailureKind =
  | "SOURCE_UNAVAILABLE"
  | "PARSE_ERROR"
  | "UNKNOWN_SOURCE"
  | "UNEXPECTED";

export interface FetchFailure {
  operation: FetchOperation;
  sector: Sector;
  source: SourceId;
  kind: FetchFailureKind;
  message: string;
}

/**
 * Per-sector merge of a fan-out. A sector key is present when at least one of
 * its (sector, source) pairs succeeded; failed pairs only show up in `failures`.
 */
export interface SectorBatch<T> {
  records: Partial<Record<Sector, T[]>>;
  failures: FetchFailure[];
}

/** One sampled year of a sector trend: outcomes for past years, open targets for future ones. */
export interface TrendPoint {
  year: number;
  actuals: ActualRecord[];
  predictions: Prediction[];
}

export interface TrendData {
  startYear: number;
  endYear: number;
  years: number[];
  /** Every requested sector, one point per sampled year */
  series: Partial<Record<Sector, TrendPoint[]>>;
  failures: FetchFailure[];
}

/** Aggregate view of a sector's open targets. */
export interface SectorOutlook {
  sector: Sector;
  outlook: Outlook;
  /** In [0, 1]; 0 when the sector has no scored targets */
  confidenceScore: number;
  predictionCount: number;
}

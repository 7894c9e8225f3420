export * from "./domain/types";
export * from "./domain/errors";
export { parseQuantity, normalizeMetric, normalizeQuantity, formatQuantity } from "./domain/quantity";
export { loadSettings, validateSettings, DEFAULT_SETTINGS, type Settings } from "./config/settings";
export { deriveCacheKey, type CacheKey } from "./cache/cache_key";
export { TtlCache, temporalTtlPolicy, fixedTtlPolicy, type TtlPolicy } from "./cache/ttl_cache";
export * from "./sources";
export {
  DEFAULT_TREND_STEP,
  FetchOrchestrator,
  type BatchOptions,
  type TrendOptions,
} from "./orchestrator/fetch_orchestrator";
export {
  classify,
  classifyAll,
  computeSectorStats,
  matchActual,
  mergeSectorStats,
  tallyStatuses,
} from "./engine/classification";
export {
  analyzeFutureLikelihood,
  summarizeSector,
  tallyOutlooks,
  validatePrediction,
} from "./engine/likelihood";
export { evaluatePastForecasts } from "./analysis/evaluate_past_forecasts";
export { assessFutureTargets } from "./analysis/assess_future_targets";
export { CitationRegistry } from "./analysis/citations";
export { planWindows, steppedWindows } from "./analysis/plan_periods";
export {
  toWireAssessment,
  toWireClassification,
  toWireEvaluation,
  toWireTargetAssessment,
} from "./analysis/wire";
export { createForecastLedger, getSharedLedger } from "./ledger";
export { fixedClock, manualClock, systemClock, type Clock } from "./util/clock";

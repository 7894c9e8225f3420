import type { ClassificationResult, LikelihoodAssessment } from "../../domain/types";
import { CitationRegistry } from "../citations";
import type { PastForecastEvaluation } from "../evaluate_past_forecasts";
import { toWireAssessment, toWireClassification, toWireEvaluation } from "../wire";

const PLAN_URL = "https://docs.example.test/plan";
const STATS_URL = "https://stats.example.test/2000";

const onTime: ClassificationResult = {
  forecast: {
    metric: "GDP Growth Rate",
    predictedValue: { value: 6.5, unit: "%" },
    source: "planning-commission",
    sector: "Economy",
    forecastYear: 1975,
    targetYear: 2000,
    provenanceUrl: PLAN_URL,
    rawConfidence: "medium",
  },
  actual: {
    metric: "GDP Growth Rate",
    actualValue: { value: 5.9, unit: "%" },
    sector: "Economy",
    year: 2000,
    source: "mospi",
    provenanceUrl: STATS_URL,
  },
  status: "ON_TIME",
  deviationRatio: -0.09,
  toleranceBand: "moderate",
};

const unresolved: ClassificationResult = {
  forecast: { ...onTime.forecast, metric: "Savings Rate" },
  actual: null,
  status: "UNRESOLVED",
  deviationRatio: null,
  toleranceBand: "moderate",
};

describe("toWireClassification", () => {
  it("renames fields and tags provenance", () => {
    expect(toWireClassification(onTime)).toEqual({
      forecast: {
        metric: "GDP Growth Rate",
        predicted_value: { value: 6.5, unit: "%" },
        source: "planning-commission",
        sector: "Economy",
        forecast_year: 1975,
        target_year: 2000,
        provenance_url: PLAN_URL,
        raw_confidence: "medium",
        citation: "web:1",
      },
      actual: {
        metric: "GDP Growth Rate",
        actual_value: { value: 5.9, unit: "%" },
        sector: "Economy",
        year: 2000,
        source: "mospi",
        provenance_url: STATS_URL,
        citation: "web:2",
      },
      status: "ON_TIME",
      deviation_ratio: -0.09,
      tolerance_band: "moderate",
    });
  });

  it("keeps a null actual", () => {
    expect(toWireClassification(unresolved).actual).toBeNull();
  });
});

describe("toWireAssessment", () => {
  it("shares the citation registry it is given", () => {
    const citations = new CitationRegistry();
    citations.add("https://elsewhere.example.test");
    const assessment: LikelihoodAssessment = {
      prediction: {
        metric: "Solar Capacity",
        targetValue: { value: 280, unit: "GW" },
        currentProgress: { value: 82, unit: "GW" },
        progressYear: 2024,
        source: "mnre",
        sector: "Energy",
        announcementYear: 2020,
        targetYear: 2030,
        provenanceUrl: "https://docs.example.test/solar",
        rawConfidence: "medium",
      },
      probability: 0.4,
      confidence: "low",
      outlook: "LATE_RISK",
      rationale: ["a", "b"],
    };

    const wire = toWireAssessment(assessment, citations);
    expect(wire.prediction).toMatchObject({
      target_value: { value: 280, unit: "GW" },
      current_progress: { value: 82, unit: "GW" },
      progress_year: 2024,
      announcement_year: 2020,
      citation: "web:2",
    });
    expect(wire).toMatchObject({
      probability: 0.4,
      confidence: "low",
      outlook: "LATE_RISK",
      rationale: ["a", "b"],
    });
  });
});

describe("toWireEvaluation", () => {
  it("numbers citations across the whole report", () => {
    const report: PastForecastEvaluation = {
      forecastYear: 1975,
      targetYear: 2000,
      band: "moderate",
      results: { Economy: [onTime, unresolved] },
      stats: {
        Economy: {
          sector: "Economy",
          sampleSize: 1,
          early: 0,
          onTime: 1,
          late: 0,
          unresolved: 1,
          accuracyRate: 1,
        },
      },
      tally: { EARLY: 0, ON_TIME: 1, LATE: 0, UNRESOLVED: 1 },
      failures: [
        {
          operation: "actual",
          sector: "Economy",
          source: "world-bank",
          kind: "SOURCE_UNAVAILABLE",
          message: "timed out",
        },
      ],
    };

    const wire = toWireEvaluation(report);
    expect(wire.results.Economy?.map((r) => r.forecast.citation)).toEqual(["web:1", "web:1"]);
    expect(wire.citations).toEqual([
      { tag: "web:1", url: PLAN_URL },
      { tag: "web:2", url: STATS_URL },
    ]);
    expect(wire.sector_stats).toEqual({
      Economy: {
        sample_size: 1,
        early: 0,
        on_time: 1,
        late: 0,
        unresolved: 1,
        accuracy_rate: 1,
      },
    });
    expect(wire.status_counts).toEqual({ EARLY: 0, ON_TIME: 1, LATE: 0, UNRESOLVED: 1 });
    expect(wire.failures).toEqual(report.failures);
    expect(wire.tolerance_band).toBe("moderate");
  });
});

import { InvalidPredictionError } from "../../domain/errors";
import type {
  HistoricalStats,
  LikelihoodAssessment,
  Outlook,
  Prediction,
  SectorStats,
} from "../../domain/types";
import { fixedClock } from "../../util/clock";
import {
  analyzeFutureLikelihood,
  baselineProbability,
  confidenceFor,
  outlookFor,
  progressRatio,
  summarizeSector,
  tallyOutlooks,
  timeRatio,
  validatePrediction,
} from "../likelihood";

const clock = fixedClock("2024-06-01T00:00:00Z");

function prediction(overrides: Partial<Prediction> = {}): Prediction {
  return {
    metric: "Renewable Energy Capacity",
    targetValue: { value: 450, unit: "GW" },
    currentProgress: { value: 118, unit: "GW" },
    progressYear: 2024,
    source: "niti-aayog",
    sector: "Energy",
    announcementYear: 2019,
    targetYear: 2030,
    provenanceUrl: "https://docs.example.test/renewables",
    rawConfidence: "high",
    ...overrides,
  };
}

function energyStats(early: number, onTime: number, late: number): HistoricalStats {
  const sampleSize = early + onTime + late;
  const stats: SectorStats = {
    sector: "Energy",
    sampleSize,
    early,
    onTime,
    late,
    unresolved: 0,
    accuracyRate: sampleSize > 0 ? (early + onTime) / sampleSize : null,
  };
  return { Energy: stats };
}

describe("ratios and baseline", () => {
  it("measures progress and elapsed time", () => {
    expect(progressRatio(prediction())).toBeCloseTo(118 / 450, 12);
    expect(timeRatio(prediction(), 2024)).toBeCloseTo(5 / 11, 12);
    expect(timeRatio(prediction(), 2035)).toBe(1);
    expect(timeRatio(prediction(), 2010)).toBe(0);
  });

  it("is a logistic in the schedule gap", () => {
    expect(baselineProbability(0)).toBe(0.5);
    expect(baselineProbability(0.1, 10)).toBeCloseTo(1 / (1 + Math.exp(-1)), 12);
    expect(baselineProbability(-0.5)).toBeLessThan(baselineProbability(0.5));
  });
});

describe("confidenceFor", () => {
  it("needs enough history for high confidence", () => {
    expect(confidenceFor(0.85, 5, 5)).toBe("high");
    expect(confidenceFor(0.85, 2, 5)).toBe("medium");
  });

  it("maps the probability bands", () => {
    expect(confidenceFor(0.8, 10, 5)).toBe("medium");
    expect(confidenceFor(0.6, 10, 5)).toBe("medium");
    expect(confidenceFor(0.59, 10, 5)).toBe("low");
    expect(confidenceFor(0.3, 0, 5)).toBe("low");
  });
});

describe("outlookFor", () => {
  it("flags overdue unmet targets", () => {
    expect(outlookFor(0.5, 0.9, 2030, 2030)).toBe("LATE_RISK");
  });

  it("uses a margin around the schedule", () => {
    expect(outlookFor(0.2, 0.6, 2024, 2030)).toBe("LIKELY_EARLY");
    expect(outlookFor(0.1, 0.5, 2024, 2030)).toBe("ON_TIME");
    expect(outlookFor(-0.1, 0.3, 2024, 2030)).toBe("ON_TIME");
    expect(outlookFor(-0.2, 0.2, 2024, 2030)).toBe("LATE_RISK");
  });
});

describe("validatePrediction", () => {
  it("rejects zero targets", () => {
    expect(() =>
      validatePrediction(prediction({ targetValue: { value: 0, unit: "GW" } }))
    ).toThrow(new InvalidPredictionError("Renewable Energy Capacity", "target value is zero"));
  });

  it("rejects empty windows", () => {
    expect(() => validatePrediction(prediction({ announcementYear: 2030 }))).toThrow(
      'Invalid prediction "Renewable Energy Capacity": target year 2030 is not after announcement year 2030'
    );
  });

  it("rejects progress in another unit", () => {
    expect(() =>
      validatePrediction(prediction({ currentProgress: { value: 10, unit: "km" } }))
    ).toThrow(InvalidPredictionError);
  });

  it("accepts progress that only differs by scale", () => {
    expect(() =>
      validatePrediction(prediction({ currentProgress: { value: 118000, unit: "MW" } }))
    ).not.toThrow();
  });
});

describe("analyzeFutureLikelihood", () => {
  it("scores a target behind schedule with no sector history", () => {
    const assessment = analyzeFutureLikelihood(prediction(), {}, { clock });

    expect(assessment.probability).toBeCloseTo(0.1918, 3);
    expect(assessment.confidence).toBe("low");
    expect(assessment.outlook).toBe("LATE_RISK");
    expect(assessment.rationale).toEqual([
      "Progress at 26.2% of target with 45.5% of the window elapsed (behind schedule by 19.2%)",
      "No resolved Energy forecasts; using sector prior of 60.0%",
      "Only 0 resolved Energy forecasts (fewer than 5); confidence is limited",
    ]);
  });

  it("uses the sector record when history exists", () => {
    const assessment = analyzeFutureLikelihood(prediction(), energyStats(2, 4, 0), {
      clock,
    });

    expect(assessment.probability).toBeCloseTo(0.2398, 3);
    expect(assessment.rationale).toEqual([
      "Progress at 26.2% of target with 45.5% of the window elapsed (behind schedule by 19.2%)",
      "Energy forecasts resolved early or on time in 100.0% of 6 cases",
      "5 of 11 years elapsed since announcement in 2019",
    ]);
  });

  it("gives high confidence to a well-supported target ahead of plan", () => {
    const assessment = analyzeFutureLikelihood(
      prediction({
        targetValue: { value: 100, unit: "GW" },
        currentProgress: { value: 90, unit: "GW" },
        announcementYear: 2020,
      }),
      energyStats(5, 5, 0),
      { clock }
    );

    expect(assessment.probability).toBeCloseTo(1 / (1 + Math.exp(-3)), 9);
    expect(assessment.confidence).toBe("high");
    expect(assessment.outlook).toBe("LIKELY_EARLY");
  });

  it("lists the larger effect first", () => {
    // on schedule: the baseline carries no signal, the weak history does
    const assessment = analyzeFutureLikelihood(
      prediction({
        targetValue: { value: 100, unit: "GW" },
        currentProgress: { value: 40, unit: "GW" },
        announcementYear: 2020,
      }),
      energyStats(0, 1, 9),
      { clock }
    );

    expect(assessment.outlook).toBe("ON_TIME");
    expect(assessment.probability).toBeCloseTo(0.275, 9);
    expect(assessment.rationale[0]).toBe(
      "Energy forecasts resolved early or on time in 10.0% of 10 cases"
    );
  });

  it("marks overdue targets as at risk", () => {
    const assessment = analyzeFutureLikelihood(
      prediction({
        targetValue: { value: 100, unit: "GW" },
        currentProgress: { value: 95, unit: "GW" },
        announcementYear: 2018,
        targetYear: 2023,
      }),
      {},
      { clock }
    );
    expect(assessment.outlook).toBe("LATE_RISK");
    expect(assessment.rationale[2]).toBe(
      "Only 0 resolved Energy forecasts (fewer than 5); confidence is limited"
    );
  });

  it("never decreases as progress improves", () => {
    const probabilities = [0, 50, 100, 150, 200, 250, 300, 400, 450].map(
      (value) =>
        analyzeFutureLikelihood(
          prediction({ currentProgress: { value, unit: "GW" } }),
          energyStats(3, 3, 2),
          { clock }
        ).probability
    );
    probabilities.slice(1).forEach((p, i) => {
      expect(p).toBeGreaterThanOrEqual(probabilities[i]);
    });
  });

  it("honours steepness and minimum sample size", () => {
    const assessment = analyzeFutureLikelihood(prediction(), energyStats(2, 4, 0), {
      clock,
      steepness: 0,
      minSampleSize: 10,
    });
    expect(assessment.probability).toBe(0.5);
    expect(assessment.rationale[2]).toBe(
      "Only 6 resolved Energy forecasts (fewer than 10); confidence is limited"
    );
  });
});

describe("tallyOutlooks", () => {
  it("counts outlooks across sectors", () => {
    const late = analyzeFutureLikelihood(prediction(), {}, { clock });
    expect(tallyOutlooks({ Energy: [late, late], Economy: [] })).toEqual({
      LIKELY_EARLY: 0,
      ON_TIME: 0,
      LATE_RISK: 2,
    });
  });
});

describe("summarizeSector", () => {
  function scored(outlook: Outlook, probability: number): LikelihoodAssessment {
    return { prediction: prediction(), probability, confidence: "medium", outlook, rationale: [] };
  }

  it("returns a neutral summary for a sector with no targets", () => {
    expect(summarizeSector("Energy", [], 6)).toEqual({
      sector: "Energy",
      outlook: "ON_TIME",
      confidenceScore: 0,
      predictionCount: 0,
    });
  });

  it("leans with the mean outlook and adds count and horizon bonuses", () => {
    const summary = summarizeSector(
      "Energy",
      [scored("LIKELY_EARLY", 0.6), scored("LIKELY_EARLY", 0.8)],
      6
    );
    expect(summary.outlook).toBe("LIKELY_EARLY");
    expect(summary.predictionCount).toBe(2);
    expect(summary.confidenceScore).toBeCloseTo(0.7 + 0.04 + 0.07, 12);
  });

  it("stays on time when early and late targets cancel out", () => {
    const summary = summarizeSector(
      "Energy",
      [scored("LIKELY_EARLY", 0.8), scored("LATE_RISK", 0.2), scored("ON_TIME", 0.5)],
      25
    );
    expect(summary.outlook).toBe("ON_TIME");
    expect(summary.confidenceScore).toBeCloseTo(0.5 + 0.06, 12);
  });

  it("leans late past the threshold and caps the score at one", () => {
    const late = summarizeSector(
      "Energy",
      [scored("LATE_RISK", 0.3), scored("LATE_RISK", 0.3), scored("ON_TIME", 0.3)],
      10
    );
    expect(late.outlook).toBe("LATE_RISK");

    const sure = summarizeSector(
      "Energy",
      Array.from({ length: 6 }, () => scored("LIKELY_EARLY", 0.95)),
      0
    );
    expect(sure.confidenceScore).toBe(1);
  });
});

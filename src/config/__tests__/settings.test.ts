import { InvalidConfigurationError } from "../../domain/errors";
import { DEFAULT_SETTINGS, loadSettings, validateSettings } from "../settings";

describe("loadSettings", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.STAGE;
    for (const name of [
      "CACHE_TTL_SECONDS",
      "HISTORICAL_CACHE_TTL_SECONDS",
      "REQUEST_TIMEOUT_SECONDS",
      "MAX_RETRIES",
      "REQUEST_DELAY_SECONDS",
      "MAX_CONCURRENT_REQUESTS",
      "TOLERANCE_STRICT",
      "TOLERANCE_MODERATE",
      "TOLERANCE_LOOSE",
      "DEFAULT_TOLERANCE_BAND",
      "MIN_SAMPLE_SIZE",
    ]) {
      delete process.env[name];
    }
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  it("falls back to documented defaults", () => {
    expect(loadSettings()).toEqual(DEFAULT_SETTINGS);
    expect(DEFAULT_SETTINGS.historicalCacheTtlSeconds).toBe(Infinity);
  });

  it("reads overrides from the environment", () => {
    process.env.CACHE_TTL_SECONDS = "120";
    process.env.MAX_CONCURRENT_REQUESTS = "2";
    process.env.TOLERANCE_STRICT = "0.02";
    process.env.DEFAULT_TOLERANCE_BAND = "strict";
    process.env.HISTORICAL_CACHE_TTL_SECONDS = "86400";

    const settings = loadSettings();
    expect(settings.cacheTtlSeconds).toBe(120);
    expect(settings.maxConcurrentRequests).toBe(2);
    expect(settings.tolerance).toEqual({
      strict: 0.02,
      moderate: 0.15,
      loose: 0.25,
    });
    expect(settings.defaultBand).toBe("strict");
    expect(settings.historicalCacheTtlSeconds).toBe(86400);
  });

  it("rejects non-numeric values", () => {
    process.env.MAX_RETRIES = "lots";
    expect(() => loadSettings()).toThrow(InvalidConfigurationError);
  });

  it("rejects bands that are not strictly increasing", () => {
    process.env.TOLERANCE_MODERATE = "0.3";
    try {
      loadSettings();
      throw new Error("expected loadSettings to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      if (!(error instanceof InvalidConfigurationError)) return;
      expect(error.issues).toEqual([
        "tolerance: tolerance bands must satisfy strict < moderate < loose",
      ]);
    }
  });

  it("rejects non-positive timeouts and thresholds above one", () => {
    expect(() =>
      validateSettings({ ...DEFAULT_SETTINGS, requestTimeoutSeconds: 0 })
    ).toThrow(InvalidConfigurationError);
    expect(() =>
      validateSettings({
        ...DEFAULT_SETTINGS,
        tolerance: { strict: 0.5, moderate: 0.9, loose: 1.5 },
      })
    ).toThrow(/tolerance\.loose/);
  });

  it("reports an unknown default band instead of replacing it", () => {
    process.env.DEFAULT_TOLERANCE_BAND = "tight";
    try {
      loadSettings();
      throw new Error("expected loadSettings to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      if (!(error instanceof InvalidConfigurationError)) return;
      expect(error.issues).toEqual([
        "defaultBand: Invalid enum value. Expected 'strict' | 'moderate' | 'loose', received 'tight'",
      ]);
    }
  });

  it("explicit overrides win over the environment", () => {
    process.env.MIN_SAMPLE_SIZE = "9";
    expect(loadSettings({ minSampleSize: 3 }).minSampleSize).toBe(3);
  });
});

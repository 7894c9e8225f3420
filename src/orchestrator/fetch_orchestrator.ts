import Bottleneck from "bottleneck";
import type { z } from "zod";
import { deriveCacheKey } from "../cache/cache_key";
import { temporalTtlPolicy, TtlCache, type CacheStats } from "../cache/ttl_cache";
import { DEFAULT_SETTINGS, type Settings } from "../config/settings";
import {
  BatchAbortedError,
  ContractViolationError,
  ParseError,
  SourceUnavailableError,
  errorMessage,
} from "../domain/errors";
import { fail, ok, type Result } from "../domain/result";
import {
  actualRecordSchema,
  forecastRecordSchema,
  predictionSchema,
} from "../domain/schemas";
import {
  SECTORS,
  type ActualRecord,
  type FetchFailure,
  type FetchFailureKind,
  type FetchOperation,
  type ForecastRecord,
  type Prediction,
  type Sector,
  type SectorBatch,
  type SourceId,
  type TrendData,
  type TrendPoint,
} from "../domain/types";
import type { FetcherTable, SourceFetcher } from "../sources/contracts";
import { defaultSourceRegistry, type SourceRegistry } from "../sources/registry";
import { currentYear, systemClock, type Clock } from "../util/clock";
import { getLogger } from "../util/logger";

const logger = getLogger("orchestrator/fetch_orchestrator");

export type OrchestratorSettings = Pick<
  Settings,
  | "cacheTtlSeconds"
  | "historicalCacheTtlSeconds"
  | "maxConcurrentRequests"
  | "requestDelaySeconds"
>;

export interface FetchOrchestratorOptions {
  fetchers: FetcherTable;
  registry?: SourceRegistry;
  settings?: OrchestratorSettings;
  clock?: Clock;
}

export interface BatchOptions {
  /** Abandons the batch; fetches already started still complete and fill the cache */
  signal?: AbortSignal;
}

export interface TrendOptions extends BatchOptions {
  /** Years between samples, counted from startYear */
  step?: number;
}

export const DEFAULT_TREND_STEP = 5;

interface PairTask<T> {
  sector: Sector;
  source: SourceId;
  run: (fetcher: SourceFetcher) => Promise<T[]>;
}

function uniqueSectors(sectors: readonly Sector[]): Sector[] {
  const wanted = new Set(sectors);
  return SECTORS.filter((s) => wanted.has(s));
}

function uniqueSources(sources: readonly SourceId[]): SourceId[] {
  return Array.from(new Set(sources)).sort((a, b) => a.localeCompare(b));
}

function failureKind(error: unknown): FetchFailureKind {
  if (error instanceof SourceUnavailableError) return "SOURCE_UNAVAILABLE";
  if (error instanceof ParseError) return "PARSE_ERROR";
  return "UNEXPECTED";
}

/**
 * Checks fetcher output before it is cached; a malformed record fails the pair.
 */
function conform<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  source: SourceId,
  operation: FetchOperation
): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ParseError(
      source,
      `Malformed ${operation} record from ${source}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid shape"}`
    );
  }
  return parsed.data;
}

const forecastListSchema = forecastRecordSchema.array();
const actualOrNullSchema = actualRecordSchema.nullable();
const predictionListSchema = predictionSchema.array();

/**
 * Fans (sector x source) queries out to the registered fetchers under a global
 * concurrency cap and a per-source request spacing, memoizing every pair.
 * Pair failures are recorded in the batch, never thrown.
 */
export class FetchOrchestrator {
  private readonly fetchers: FetcherTable;
  private readonly registry: SourceRegistry;
  private readonly settings: OrchestratorSettings;
  private readonly global: Bottleneck;
  private readonly perSource = new Map<SourceId, Bottleneck>();

  private readonly historicalCache: TtlCache<ForecastRecord[]>;
  private readonly actualCache: TtlCache<ActualRecord | null>;
  private readonly currentCache: TtlCache<Prediction[]>;
  private readonly trendCache: TtlCache<TrendData>;
  private readonly clock: Clock;

  constructor(options: FetchOrchestratorOptions) {
    this.fetchers = options.fetchers;
    this.registry = options.registry ?? defaultSourceRegistry;
    this.settings = options.settings ?? DEFAULT_SETTINGS;
    const clock = options.clock ?? systemClock;
    this.clock = clock;

    this.global = new Bottleneck({
      maxConcurrent: this.settings.maxConcurrentRequests,
    });

    const policy = temporalTtlPolicy({
      liveTtlMs: this.settings.cacheTtlSeconds * 1000,
      historicalTtlMs: this.settings.historicalCacheTtlSeconds * 1000,
      clock,
    });
    this.historicalCache = new TtlCache({ policy, clock, name: "historical" });
    this.actualCache = new TtlCache({ policy, clock, name: "actual" });
    this.currentCache = new TtlCache({ policy, clock, name: "current" });
    this.trendCache = new TtlCache({ policy, clock, name: "trend" });
  }

  async fetchHistoricalForecasts(
    forecastYear: number,
    targetYear: number,
    sectors: readonly Sector[],
    sources: readonly SourceId[],
    options: BatchOptions = {}
  ): Promise<SectorBatch<ForecastRecord>> {
    const tasks = this.pairs(sectors, sources).map(
      ({ sector, source }): PairTask<ForecastRecord> => ({
        sector,
        source,
        run: (fetcher) =>
          this.historicalCache.getOrFetch(
            deriveCacheKey({
              operation: "historical",
              sectors: [sector],
              sources: [source],
              span: [forecastYear, targetYear],
            }),
            async () =>
              conform(
                forecastListSchema,
                await this.schedule(source, () =>
                  fetcher.fetchHistorical(forecastYear, targetYear, sector)
                ),
                source,
                "historical"
              )
          ),
      })
    );
    return this.runBatch("historical", tasks, options);
  }

  /** Queries every registered source whose capabilities include actuals. */
  async fetchActualOutcomes(
    targetYear: number,
    sectors: readonly Sector[],
    options: BatchOptions = {}
  ): Promise<SectorBatch<ActualRecord>> {
    const sources = this.registry
      .withCapability("actual")
      .filter((id) => this.fetchers[id] !== undefined);

    const tasks = this.pairs(sectors, sources).map(
      ({ sector, source }): PairTask<ActualRecord> => ({
        sector,
        source,
        run: async (fetcher) => {
          const actual = await this.actualCache.getOrFetch(
            deriveCacheKey({
              operation: "actual",
              sectors: [sector],
              sources: [source],
              years: [targetYear],
            }),
            async () =>
              conform(
                actualOrNullSchema,
                await this.schedule(source, () =>
                  fetcher.fetchActual(targetYear, sector)
                ),
                source,
                "actual"
              )
          );
          return actual ? [actual] : [];
        },
      })
    );
    return this.runBatch("actual", tasks, options);
  }

  async fetchCurrentPredictions(
    targetYear: number,
    sectors: readonly Sector[],
    sources: readonly SourceId[],
    options: BatchOptions = {}
  ): Promise<SectorBatch<Prediction>> {
    const tasks = this.pairs(sectors, sources).map(
      ({ sector, source }): PairTask<Prediction> => ({
        sector,
        source,
        run: (fetcher) =>
          this.currentCache.getOrFetch(
            deriveCacheKey({
              operation: "current",
              sectors: [sector],
              sources: [source],
              years: [targetYear],
            }),
            async () =>
              conform(
                predictionListSchema,
                await this.schedule(source, () =>
                  fetcher.fetchCurrent(targetYear, sector)
                ),
                source,
                "current"
              )
          ),
      })
    );
    return this.runBatch("current", tasks, options);
  }

  /**
   * Samples `startYear..endYear` every `step` years for each sector: recorded
   * outcomes for years up to the current one, open targets after it. Outcomes
   * come from sources publishing actuals, targets from sources publishing
   * current targets. A complete trend is cached under a key that ignores
   * sector order; one with failures is recomputed on the next call.
   */
  async fetchTrendData(
    startYear: number,
    endYear: number,
    sectors: readonly Sector[],
    options: TrendOptions = {}
  ): Promise<TrendData> {
    const step = options.step ?? DEFAULT_TREND_STEP;
    if (!Number.isInteger(step) || step <= 0) {
      throw new ContractViolationError(`Trend step must be a positive integer, got ${step}`);
    }
    const { signal } = options;
    if (signal?.aborted) throw new BatchAbortedError("trend");

    const key = deriveCacheKey({
      operation: `trend/step=${step}`,
      sectors,
      span: [startYear, endYear],
    });
    const work = this.trendCache.getOrFetch(key, () =>
      this.collectTrend(startYear, endYear, step, uniqueSectors(sectors))
    );
    const trend = signal ? await raceAbort(work, signal, "trend") : await work;
    if (trend.failures.length > 0) this.trendCache.invalidate(key);
    return trend;
  }

  private async collectTrend(
    startYear: number,
    endYear: number,
    step: number,
    sectors: Sector[]
  ): Promise<TrendData> {
    const years: number[] = [];
    for (let year = startYear; year <= endYear; year += step) years.push(year);

    const nowYear = currentYear(this.clock);
    const targetSources = this.registry
      .withCapability("current")
      .filter((id) => this.fetchers[id] !== undefined);

    const samples = await Promise.all(
      years.map(async (year) => {
        if (year <= nowYear) {
          const batch = await this.fetchActualOutcomes(year, sectors);
          return { year, actuals: batch, predictions: undefined };
        }
        const batch = await this.fetchCurrentPredictions(year, sectors, targetSources);
        return { year, actuals: undefined, predictions: batch };
      })
    );

    const series: Partial<Record<Sector, TrendPoint[]>> = {};
    for (const sector of sectors) {
      series[sector] = samples.map(({ year, actuals, predictions }) => ({
        year,
        actuals: actuals?.records[sector] ?? [],
        predictions: predictions?.records[sector] ?? [],
      }));
    }

    return {
      startYear,
      endYear,
      years,
      series,
      failures: samples.flatMap(
        (s) => s.actuals?.failures ?? s.predictions?.failures ?? []
      ),
    };
  }

  cacheStats(): Record<FetchOperation, CacheStats> {
    return {
      historical: this.historicalCache.stats(),
      actual: this.actualCache.stats(),
      current: this.currentCache.stats(),
    };
  }

  trendCacheStats(): CacheStats {
    return this.trendCache.stats();
  }

  clearCache(): void {
    this.historicalCache.clear();
    this.actualCache.clear();
    this.currentCache.clear();
    this.trendCache.clear();
  }

  private pairs(
    sectors: readonly Sector[],
    sources: readonly SourceId[]
  ): Array<{ sector: Sector; source: SourceId }> {
    const orderedSources = uniqueSources(sources);
    return uniqueSectors(sectors).flatMap((sector) =>
      orderedSources.map((source) => ({ sector, source }))
    );
  }

  private limiterFor(source: SourceId): Bottleneck {
    const existing = this.perSource.get(source);
    if (existing) return existing;

    const minTime =
      this.registry.get(source)?.minRequestIntervalMs ??
      this.settings.requestDelaySeconds * 1000;
    const limiter = new Bottleneck({ minTime }).chain(this.global);
    this.perSource.set(source, limiter);
    return limiter;
  }

  private schedule<T>(source: SourceId, call: () => Promise<T>): Promise<T> {
    return this.limiterFor(source).schedule(call);
  }

  private async settle<T>(
    operation: FetchOperation,
    task: PairTask<T>
  ): Promise<Result<T[], FetchFailure>> {
    const { sector, source } = task;
    const fetcher = this.fetchers[source];
    if (!fetcher) {
      return fail({
        operation,
        sector,
        source,
        kind: "UNKNOWN_SOURCE",
        message: `No fetcher registered for source ${source}`,
      });
    }
    // a catalogued source without the capability has nothing to offer
    if (this.registry.get(source) && !this.registry.supports(source, operation)) {
      return ok([]);
    }

    try {
      return ok(await task.run(fetcher));
    } catch (error) {
      const failure: FetchFailure = {
        operation,
        sector,
        source,
        kind: failureKind(error),
        message: errorMessage(error),
      };
      logger.warn(failure, "Source fetch failed; continuing without it");
      return fail(failure);
    }
  }

  private async runBatch<T>(
    operation: FetchOperation,
    tasks: PairTask<T>[],
    options: BatchOptions
  ): Promise<SectorBatch<T>> {
    const { signal } = options;
    if (signal?.aborted) throw new BatchAbortedError(operation);

    const work = Promise.all(tasks.map((task) => this.settle(operation, task)));
    const settled = signal ? await raceAbort(work, signal, operation) : await work;

    const batch: SectorBatch<T> = { records: {}, failures: [] };
    settled.forEach((outcome, index) => {
      const { sector } = tasks[index];
      if (outcome.ok) {
        batch.records[sector] = [...(batch.records[sector] ?? []), ...outcome.data];
      } else {
        batch.failures.push(outcome.error);
      }
    });

    logger.info(
      {
        operation,
        pairs: tasks.length,
        sectors: Object.keys(batch.records).length,
        failures: batch.failures.length,
      },
      "Fetch batch completed"
    );
    return batch;
  }
}

function raceAbort<T>(
  work: Promise<T>,
  signal: AbortSignal,
  operation: string
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      logger.info({ operation }, "Batch abandoned by caller");
      reject(new BatchAbortedError(operation));
    };
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

import type {
  ActualRecord,
  ForecastRecord,
  Prediction,
  Sector,
  SourceId,
} from "../domain/types";

/**
 * Capability contract every source strategy implements. "No data" is an empty
 * list or null; failures are SourceUnavailableError or ParseError only.
 */
export interface SourceFetcher {
  readonly sourceId: SourceId;

  fetchHistorical(
    forecastYear: number,
    targetYear: number,
    sector: Sector
  ): Promise<ForecastRecord[]>;

  fetchActual(year: number, sector: Sector): Promise<ActualRecord | null>;

  fetchCurrent(targetYear: number, sector: Sector): Promise<Prediction[]>;
}

/** Lookup table the orchestrator dispatches through. */
export type FetcherTable = Partial<Record<SourceId, SourceFetcher>>;

/**
 * Supplies empty results for capabilities a source does not have.
 */
export abstract class BaseSourceFetcher implements SourceFetcher {
  constructor(readonly sourceId: SourceId) {}

  async fetchHistorical(
    _forecastYear: number,
    _targetYear: number,
    _sector: Sector
  ): Promise<ForecastRecord[]> {
    return [];
  }

  async fetchActual(_year: number, _sector: Sector): Promise<ActualRecord | null> {
    return null;
  }

  async fetchCurrent(_targetYear: number, _sector: Sector): Promise<Prediction[]> {
    return [];
  }
}

export function fetcherTable(fetchers: readonly SourceFetcher[]): FetcherTable {
  const table: FetcherTable = {};
  for (const fetcher of fetchers) {
    table[fetcher.sourceId] = fetcher;
  }
  return table;
}

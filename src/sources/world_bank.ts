import { z } from "zod";
import { ParseError } from "../domain/errors";
import { normalizeQuantity } from "../domain/quantity";
import type { ActualRecord, Sector } from "../domain/types";
import { getLogger } from "../util/logger";
import { BaseSourceFetcher } from "./contracts";
import type { HttpClient } from "./http_client";
import { defaultMetricCatalog, type MetricCatalog } from "./metric_catalog";

const logger = getLogger("sources/world_bank");

export const WORLD_BANK_API = "https://api.worldbank.org/v2";

const rowSchema = z.object({
  value: z.number().nullable(),
  date: z.string(),
});

// [paging metadata, rows]; rows is null when the page is empty
const responseSchema = z.tuple([
  z.object({ page: z.number() }).passthrough(),
  z.array(rowSchema).nullable(),
]);

export interface WorldBankFetcherOptions {
  http: HttpClient;
  apiBase?: string;
  catalog?: MetricCatalog;
}

/**
 * Actuals from the World Bank indicator API, one headline indicator per sector.
 */
export class WorldBankFetcher extends BaseSourceFetcher {
  private readonly http: HttpClient;
  private readonly apiBase: string;
  private readonly catalog: MetricCatalog;

  constructor(options: WorldBankFetcherOptions) {
    super("world-bank");
    this.http = options.http;
    this.apiBase = (options.apiBase ?? WORLD_BANK_API).replace(/\/+$/, "");
    this.catalog = options.catalog ?? defaultMetricCatalog;
  }

  indicatorUrl(code: string, year: number): string {
    return `${this.apiBase}/country/IND/indicator/${encodeURIComponent(code)}?format=json&date=${year}&per_page=1`;
  }

  async fetchActual(year: number, sector: Sector): Promise<ActualRecord | null> {
    const indicator = this.catalog.forSector(sector).headlineIndicator;
    if (!indicator) return null;

    const url = this.indicatorUrl(indicator.code, year);
    const payload = await this.http.getJson(url);
    const parsed = responseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ParseError(
        url,
        `Unexpected World Bank payload for ${indicator.code}: ${parsed.error.issues[0]?.message ?? "invalid shape"}`
      );
    }

    const row = parsed.data[1]?.find((r) => r.date === String(year));
    if (!row || row.value === null) {
      logger.debug({ code: indicator.code, year }, "No World Bank value");
      return null;
    }

    return {
      metric: indicator.metric,
      actualValue: normalizeQuantity({ value: row.value, unit: indicator.unit }),
      sector,
      year,
      source: this.sourceId,
      provenanceUrl: `https://data.worldbank.org/indicator/${indicator.code}?locations=IN`,
    };
  }
}

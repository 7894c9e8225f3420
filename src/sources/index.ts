import type { Settings } from "../config/settings";
import type { SourceId } from "../domain/types";
import { fetcherTable, type FetcherTable, type SourceFetcher } from "./contracts";
import { HttpClient, type HttpClientOptions } from "./http_client";
import { NewsRssFetcher } from "./news_rss";
import {
  loadDocumentArchive,
  PublishedDocumentFetcher,
} from "./published_documents";
import { defaultSourceRegistry, type SourceRegistry } from "./registry";
import { WORLD_BANK_API, WorldBankFetcher } from "./world_bank";

export * from "./contracts";
export * from "./registry";
export { HttpClient, fetchWithRetry } from "./http_client";
export { WorldBankFetcher } from "./world_bank";
export { NewsRssFetcher, extractStatements, parseFeed } from "./news_rss";
export { PublishedDocumentFetcher, loadDocumentArchive } from "./published_documents";
export { defaultMetricCatalog, sectorPrior } from "./metric_catalog";

const ARCHIVE_SOURCES: SourceId[] = [
  "mnre",
  "mospi",
  "morth",
  "niti-aayog",
  "pib",
  "planning-commission",
  "rbi",
];

const NEWS_SOURCES: SourceId[] = ["economic-times", "the-hindu"];

export function httpOptionsFromSettings(
  settings: Pick<Settings, "maxRetries" | "requestTimeoutSeconds">
): HttpClientOptions {
  return {
    maxRetries: settings.maxRetries,
    timeoutMs: settings.requestTimeoutSeconds * 1000,
  };
}

/**
 * Fetchers for every source with a concrete strategy. Catalogued sources
 * without one (IEA, UN DESA, Mint, Reuters) are left out of the table.
 */
export function createDefaultFetchers(options: {
  settings: Pick<Settings, "maxRetries" | "requestTimeoutSeconds">;
  registry?: SourceRegistry;
  http?: HttpClient;
}): FetcherTable {
  const registry = options.registry ?? defaultSourceRegistry;
  const http =
    options.http ?? new HttpClient(httpOptionsFromSettings(options.settings));
  const archive = loadDocumentArchive();

  const fetchers: SourceFetcher[] = [
    new WorldBankFetcher({
      http,
      apiBase: registry.endpoint("world-bank", "api") ?? WORLD_BANK_API,
    }),
    ...ARCHIVE_SOURCES.map(
      (sourceId) => new PublishedDocumentFetcher({ sourceId, archive })
    ),
  ];

  for (const sourceId of NEWS_SOURCES) {
    const feedUrl = registry.endpoint(sourceId, "rss");
    if (feedUrl) fetchers.push(new NewsRssFetcher({ sourceId, feedUrl, http }));
  }

  return fetcherTable(fetchers);
}

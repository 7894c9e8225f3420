import { loadSettings, type Settings } from "./config/settings";
import { FetchOrchestrator } from "./orchestrator/fetch_orchestrator";
import { createDefaultFetchers, type FetcherTable } from "./sources";
import { defaultSourceRegistry, type SourceRegistry } from "./sources/registry";
import { systemClock, type Clock } from "./util/clock";
import { getLogger } from "./util/logger";

export interface ForecastLedger {
  settings: Settings;
  registry: SourceRegistry;
  orchestrator: FetchOrchestrator;
  clock: Clock;
}

export interface CreateLedgerOptions {
  settings?: Settings;
  registry?: SourceRegistry;
  fetchers?: FetcherTable;
  clock?: Clock;
}

/**
 * Wires settings, registry, fetchers and the orchestrator. Settings are read
 * from the environment unless given.
 */
export function createForecastLedger(
  options: CreateLedgerOptions = {}
): ForecastLedger {
  const settings = options.settings ?? loadSettings();
  const registry = options.registry ?? defaultSourceRegistry;
  const clock = options.clock ?? systemClock;
  const fetchers =
    options.fetchers ?? createDefaultFetchers({ settings, registry });

  getLogger("ledger").debug(
    {
      sources: Object.keys(fetchers),
      maxConcurrentRequests: settings.maxConcurrentRequests,
      defaultBand: settings.defaultBand,
    },
    "Forecast ledger initialised"
  );

  return {
    settings,
    registry,
    clock,
    orchestrator: new FetchOrchestrator({ fetchers, registry, settings, clock }),
  };
}

let shared: ForecastLedger | undefined;

/** Process-wide instance so warm handler invocations reuse the cache. */
export function getSharedLedger(): ForecastLedger {
  if (!shared) shared = createForecastLedger();
  return shared;
}

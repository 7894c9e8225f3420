import { z } from "zod";
import { SECTORS, type Sector } from "../domain/types";
import catalogJson from "./data/metric_catalog.json";

const indicatorSchema = z.object({
  code: z.string().min(1),
  metric: z.string().min(1),
  unit: z.string(),
});

const sectorEntrySchema = z.object({
  /** Share of forecasts expected on time when a sector has no history */
  accuracyPrior: z.number().min(0).max(1),
  headlineIndicator: indicatorSchema.nullable(),
  newsTerms: z.array(z.object({ term: z.string().min(1), metric: z.string() })),
});

const catalogSchema = z.object({
  sectors: z.record(sectorEntrySchema),
});

export type HeadlineIndicator = z.infer<typeof indicatorSchema>;
export type SectorCatalogEntry = z.infer<typeof sectorEntrySchema>;

export interface MetricCatalog {
  forSector(sector: Sector): SectorCatalogEntry;
}

const EMPTY_ENTRY: SectorCatalogEntry = {
  accuracyPrior: 0.5,
  headlineIndicator: null,
  newsTerms: [],
};

export function createMetricCatalog(raw: unknown): MetricCatalog {
  const parsed = catalogSchema.parse(raw);
  const entries = new Map<Sector, SectorCatalogEntry>();
  for (const sector of SECTORS) {
    entries.set(sector, parsed.sectors[sector] ?? EMPTY_ENTRY);
  }
  return {
    forSector: (sector) => entries.get(sector) ?? EMPTY_ENTRY,
  };
}

export const defaultMetricCatalog = createMetricCatalog(catalogJson);

export function sectorPrior(sector: Sector, catalog = defaultMetricCatalog) {
  return catalog.forSector(sector).accuracyPrior;
}

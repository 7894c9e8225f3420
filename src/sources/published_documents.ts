import { z } from "zod";
import { ParseError } from "../domain/errors";
import { normalizeQuantity, parseQuantity } from "../domain/quantity";
import {
  rawConfidenceSchema,
  sectorSchema,
  sourceIdSchema,
  yearSchema,
} from "../domain/schemas";
import type {
  ActualRecord,
  ForecastRecord,
  Prediction,
  Quantity,
  Sector,
  SourceId,
} from "../domain/types";
import { BaseSourceFetcher } from "./contracts";
import archiveJson from "./data/published_documents.json";

/**
 * Curated archive of published plan documents. Quantities are kept as printed
 * ("$5 Trillion", "118 GW (2024)") and parsed on the way out.
 */

// entries are numeric; a milestone with no quantity is rejected at load
const printedQuantity = z
  .string()
  .min(1)
  .refine((text) => parseQuantity(text) !== null, {
    message: "not a printed quantity",
  });

const forecastEntrySchema = z.object({
  metric: z.string().min(1),
  predicted: printedQuantity,
  source: sourceIdSchema,
  sector: sectorSchema,
  forecastYear: yearSchema,
  targetYear: yearSchema,
  document: z.string(),
  url: z.string().url(),
  rawConfidence: rawConfidenceSchema,
});

const actualEntrySchema = z.object({
  metric: z.string().min(1),
  actual: printedQuantity,
  source: sourceIdSchema,
  sector: sectorSchema,
  year: yearSchema,
  url: z.string().url(),
});

const targetEntrySchema = z.object({
  metric: z.string().min(1),
  target: printedQuantity,
  progress: printedQuantity,
  progressYear: yearSchema,
  source: sourceIdSchema,
  sector: sectorSchema,
  announced: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  targetYear: yearSchema,
  document: z.string(),
  url: z.string().url(),
  rawConfidence: rawConfidenceSchema,
});

export const documentArchiveSchema = z.object({
  forecasts: z.array(forecastEntrySchema),
  actuals: z.array(actualEntrySchema),
  targets: z.array(targetEntrySchema),
});

export type DocumentArchive = z.infer<typeof documentArchiveSchema>;

export function loadDocumentArchive(raw: unknown = archiveJson): DocumentArchive {
  const parsed = documentArchiveSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseError(
      "published_documents",
      `Invalid document archive: ${parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`
    );
  }
  return parsed.data;
}

function quantityOf(text: string, origin: string, context: string): Quantity {
  const parsed = parseQuantity(text);
  if (!parsed) {
    throw new ParseError(origin, `Unparseable quantity "${text}" in ${context}`);
  }
  return normalizeQuantity(parsed);
}

export interface PublishedDocumentFetcherOptions {
  sourceId: SourceId;
  archive?: DocumentArchive;
}

export class PublishedDocumentFetcher extends BaseSourceFetcher {
  private readonly archive: DocumentArchive;

  constructor(options: PublishedDocumentFetcherOptions) {
    super(options.sourceId);
    this.archive = options.archive ?? loadDocumentArchive();
  }

  async fetchHistorical(
    forecastYear: number,
    targetYear: number,
    sector: Sector
  ): Promise<ForecastRecord[]> {
    return this.archive.forecasts
      .filter(
        (e) =>
          e.source === this.sourceId &&
          e.sector === sector &&
          e.forecastYear === forecastYear &&
          e.targetYear === targetYear
      )
      .map((e) => ({
        metric: e.metric,
        predictedValue: quantityOf(e.predicted, e.url, e.document),
        source: e.source,
        sector: e.sector,
        forecastYear: e.forecastYear,
        targetYear: e.targetYear,
        provenanceUrl: e.url,
        rawConfidence: e.rawConfidence,
      }));
  }

  async fetchActual(year: number, sector: Sector): Promise<ActualRecord | null> {
    const entry = this.archive.actuals.find(
      (e) => e.source === this.sourceId && e.sector === sector && e.year === year
    );
    if (!entry) return null;
    return {
      metric: entry.metric,
      actualValue: quantityOf(entry.actual, entry.url, entry.metric),
      sector: entry.sector,
      year: entry.year,
      source: entry.source,
      provenanceUrl: entry.url,
    };
  }

  async fetchCurrent(targetYear: number, sector: Sector): Promise<Prediction[]> {
    return this.archive.targets
      .filter(
        (e) =>
          e.source === this.sourceId &&
          e.sector === sector &&
          e.targetYear === targetYear
      )
      .map((e) => ({
        metric: e.metric,
        targetValue: quantityOf(e.target, e.url, e.document),
        currentProgress: quantityOf(e.progress, e.url, e.document),
        progressYear: e.progressYear,
        source: e.source,
        sector: e.sector,
        announcementYear: Number(e.announced.slice(0, 4)),
        targetYear: e.targetYear,
        provenanceUrl: e.url,
        rawConfidence: e.rawConfidence,
      }));
  }
}

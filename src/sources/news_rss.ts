import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import { deriveCacheKey } from "../cache/cache_key";
import { fixedTtlPolicy, TtlCache } from "../cache/ttl_cache";
import { ParseError } from "../domain/errors";
import { parseQuantity } from "../domain/quantity";
import type { ForecastRecord, Sector, SourceId } from "../domain/types";
import { getLogger } from "../util/logger";
import { BaseSourceFetcher } from "./contracts";
import type { HttpClient } from "./http_client";
import { defaultMetricCatalog, type MetricCatalog } from "./metric_catalog";

const logger = getLogger("sources/news_rss");

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
});

const textSchema = z
  .union([z.string(), z.number(), z.object({ "#text": z.string() })])
  .transform((v) => (typeof v === "object" ? v["#text"] : String(v)));

const itemSchema = z.object({
  title: textSchema.optional(),
  link: z.string().optional(),
  pubDate: z.string().optional(),
  description: textSchema.optional(),
});

const feedSchema = z.object({
  rss: z.object({
    // an empty <channel/> parses to ""
    channel: z.preprocess(
      (v) => (v === "" ? {} : v),
      z.object({
        item: z.union([itemSchema, z.array(itemSchema)]).optional(),
      })
    ),
  }),
});

export type FeedItem = z.infer<typeof itemSchema>;

const BY_YEAR = /\bby\s+((?:19|20)\d{2})\b/gi;

const QUANTITY =
  /(?:₹\s*|rs\.?\s*|us\$|\$)?\d+(?:,\d+)*(?:\.\d+)?(?:\s*(?:-|–|to)\s*\d+(?:,\d+)*(?:\.\d+)?)?(?:\s*(?:%|per\s?cent|percent))?(?:\s*(?:thousand|lakhs?|million|crores?|billion|trillion)\b)?(?:\s*(?:gw|mw|km|kms|years|tonnes|kt|usd)\b)?/gi;

// sentence ends at ; ! ? or a period that is not a decimal point
const CLAUSE_BREAK = /[;!?]|\.(?!\d)/g;

export interface ExtractedStatement {
  quantityText: string;
  year: number;
}

/**
 * Finds "<quantity> ... by <year>" statements, taking the first non-year
 * quantity of the clause that precedes each "by <year>".
 */
export function extractStatements(text: string): ExtractedStatement[] {
  const found: ExtractedStatement[] = [];
  let consumed = 0;

  for (const match of text.matchAll(BY_YEAR)) {
    const end = match.index ?? 0;
    let start = consumed;
    for (const brk of text.slice(consumed, end).matchAll(CLAUSE_BREAK)) {
      start = consumed + (brk.index ?? 0) + 1;
    }
    consumed = end + match[0].length;

    const candidate = Array.from(text.slice(start, end).matchAll(QUANTITY))
      .map((q) => q[0].trim())
      .find((q) => !/^(?:19|20)\d{2}$/.test(q));
    if (candidate) {
      found.push({ quantityText: candidate, year: Number(match[1]) });
    }
  }
  return found;
}

export function parseFeed(xml: string, origin: string): FeedItem[] {
  if (XMLValidator.validate(xml) !== true) {
    throw new ParseError(origin, `Malformed RSS document from ${origin}`);
  }
  const parsed = feedSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    throw new ParseError(origin, `Document from ${origin} is not an RSS feed`);
  }
  const items = parsed.data.rss.channel.item;
  if (items === undefined) return [];
  return Array.isArray(items) ? items : [items];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export interface NewsRssFetcherOptions {
  sourceId: SourceId;
  feedUrl: string;
  http: HttpClient;
  catalog?: MetricCatalog;
  /** Raw feed bodies, shared across sectors */
  feedCache?: TtlCache<string>;
}

/**
 * Best-effort forecasts from news headlines: items published in the forecast
 * year that mention a sector term and state a quantity "by" the target year.
 */
export class NewsRssFetcher extends BaseSourceFetcher {
  private readonly feedUrl: string;
  private readonly http: HttpClient;
  private readonly catalog: MetricCatalog;
  private readonly feedCache: TtlCache<string>;

  constructor(options: NewsRssFetcherOptions) {
    super(options.sourceId);
    this.feedUrl = options.feedUrl;
    this.http = options.http;
    this.catalog = options.catalog ?? defaultMetricCatalog;
    this.feedCache =
      options.feedCache ??
      new TtlCache<string>({
        policy: fixedTtlPolicy(10 * 60 * 1000),
        name: `rss:${options.sourceId}`,
      });
  }

  async fetchHistorical(
    forecastYear: number,
    targetYear: number,
    sector: Sector
  ): Promise<ForecastRecord[]> {
    const xml = await this.feedCache.getOrFetch(
      deriveCacheKey({ operation: "rss", sources: [this.feedUrl] }),
      (url) => this.http.getText(url),
      this.feedUrl
    );
    const items = parseFeed(xml, this.feedUrl);
    const terms = this.catalog.forSector(sector).newsTerms;
    const records: ForecastRecord[] = [];

    for (const item of items) {
      if (!item.pubDate) continue;
      const published = new Date(item.pubDate);
      if (Number.isNaN(published.getTime())) continue;
      if (published.getUTCFullYear() !== forecastYear) continue;

      const text = [item.title, item.description].filter(Boolean).join(". ");
      const lowered = text.toLowerCase();
      const term = terms.find((t) =>
        new RegExp(`\\b${escapeRegExp(t.term)}\\b`).test(lowered)
      );
      if (!term) continue;

      for (const statement of extractStatements(text)) {
        if (statement.year !== targetYear) continue;
        const quantity = parseQuantity(statement.quantityText);
        if (!quantity) continue;
        records.push({
          metric: term.metric,
          predictedValue: quantity,
          source: this.sourceId,
          sector,
          forecastYear,
          targetYear,
          provenanceUrl: item.link ?? this.feedUrl,
          rawConfidence: "low",
        });
      }
    }

    logger.debug(
      { source: this.sourceId, sector, forecastYear, targetYear, count: records.length },
      "Extracted forecasts from feed"
    );
    return records;
  }
}

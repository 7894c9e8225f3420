import type { FetchOperation, SourceId } from "../domain/types";

export type SourceCategory = "government" | "international" | "news";

/** Lower wins when several actuals match one forecast. */
export type TrustTier = 0 | 1 | 2;

export const TRUST_TIER_BY_CATEGORY: Record<SourceCategory, TrustTier> = {
  government: 0,
  international: 1,
  news: 2,
};

export interface SourceDescriptor {
  id: SourceId;
  name: string;
  category: SourceCategory;
  baseUrl: string;
  endpoints: Record<string, string>;
  capabilities: readonly FetchOperation[];
  /** Overrides the global per-source request delay */
  minRequestIntervalMs?: number;
}

const DESCRIPTORS: SourceDescriptor[] = [
  {
    id: "rbi",
    name: "Reserve Bank of India",
    category: "government",
    baseUrl: "https://www.rbi.org.in",
    endpoints: { rss: "https://www.rbi.org.in/scripts/rss.aspx" },
    capabilities: ["historical", "current"],
  },
  {
    id: "mospi",
    name: "Ministry of Statistics and Programme Implementation",
    category: "government",
    baseUrl: "https://www.mospi.gov.in",
    endpoints: {
      tables: "https://www.mospi.gov.in/web/mospi/download-tables-data",
    },
    capabilities: ["actual"],
  },
  {
    id: "niti-aayog",
    name: "NITI Aayog",
    category: "government",
    baseUrl: "https://www.niti.gov.in",
    endpoints: { documents: "https://www.niti.gov.in/documents-reports" },
    capabilities: ["historical", "current"],
  },
  {
    id: "pib",
    name: "Press Information Bureau",
    category: "government",
    baseUrl: "https://pib.gov.in",
    endpoints: {},
    capabilities: ["actual", "current"],
  },
  {
    id: "planning-commission",
    name: "Planning Commission",
    category: "government",
    baseUrl: "https://www.niti.gov.in",
    endpoints: {
      archive: "https://www.niti.gov.in/planning-commission-archive",
    },
    capabilities: ["historical"],
  },
  {
    id: "morth",
    name: "Ministry of Road Transport and Highways",
    category: "government",
    baseUrl: "https://morth.nic.in",
    endpoints: {},
    capabilities: ["actual", "current"],
  },
  {
    id: "mnre",
    name: "Ministry of New and Renewable Energy",
    category: "government",
    baseUrl: "https://mnre.gov.in",
    endpoints: {},
    capabilities: ["actual", "current"],
  },
  {
    id: "world-bank",
    name: "World Bank",
    category: "international",
    baseUrl: "https://data.worldbank.org",
    endpoints: { api: "https://api.worldbank.org/v2" },
    capabilities: ["actual"],
    minRequestIntervalMs: 250,
  },
  {
    id: "iea",
    name: "International Energy Agency",
    category: "international",
    baseUrl: "https://www.iea.org",
    endpoints: {},
    capabilities: ["historical"],
  },
  {
    id: "un-desa",
    name: "UN Department of Economic and Social Affairs",
    category: "international",
    baseUrl: "https://www.un.org/development/desa",
    endpoints: {},
    capabilities: ["historical"],
  },
  {
    id: "economic-times",
    name: "Economic Times",
    category: "news",
    baseUrl: "https://economictimes.indiatimes.com",
    endpoints: {
      rss: "https://economictimes.indiatimes.com/rssfeedstopstories.cms",
    },
    capabilities: ["historical"],
  },
  {
    id: "the-hindu",
    name: "The Hindu",
    category: "news",
    baseUrl: "https://www.thehindu.com",
    endpoints: {
      rss: "https://www.thehindu.com/news/national/feeder/default.rss",
    },
    capabilities: ["historical"],
  },
  {
    id: "mint",
    name: "Mint",
    category: "news",
    baseUrl: "https://www.livemint.com",
    endpoints: {},
    capabilities: ["historical"],
  },
  {
    id: "reuters",
    name: "Reuters",
    category: "news",
    baseUrl: "https://www.reuters.com",
    endpoints: {},
    capabilities: ["historical"],
  },
];

/**
 * Static catalog of known sources, keyed by SourceId.
 */
export class SourceRegistry {
  private readonly byId: Map<SourceId, SourceDescriptor>;

  constructor(descriptors: readonly SourceDescriptor[]) {
    this.byId = new Map(descriptors.map((d) => [d.id, d]));
  }

  get(id: SourceId): SourceDescriptor | undefined {
    return this.byId.get(id);
  }

  list(): SourceDescriptor[] {
    return Array.from(this.byId.values()).sort((a, b) =>
      a.id.localeCompare(b.id)
    );
  }

  supports(id: SourceId, operation: FetchOperation): boolean {
    return this.byId.get(id)?.capabilities.includes(operation) ?? false;
  }

  withCapability(operation: FetchOperation): SourceId[] {
    return this.list()
      .filter((d) => d.capabilities.includes(operation))
      .map((d) => d.id);
  }

  /** Uncatalogued sources rank below every known tier. */
  trustTier(id: SourceId): number {
    const descriptor = this.byId.get(id);
    return descriptor ? TRUST_TIER_BY_CATEGORY[descriptor.category] : 3;
  }

  endpoint(id: SourceId, name: string): string | undefined {
    return this.byId.get(id)?.endpoints[name];
  }
}

export const defaultSourceRegistry = new SourceRegistry(DESCRIPTORS);

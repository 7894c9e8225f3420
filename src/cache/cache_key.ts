/**
 * Cache keys are derived from the operation name plus the de-duplicated,
 * sorted query tuple, so reordering sectors, sources or years yields the same
 * key. A span keeps its two years in order: (2015, 2020) and (2020, 2015) are
 * different queries.
 */

export interface CacheKey {
  readonly id: string;
  /** Latest year the key refers to; drives the temporal TTL policy */
  readonly latestYear?: number;
}

export interface CacheKeyInput {
  operation: string;
  sectors?: readonly string[];
  sources?: readonly string[];
  years?: readonly number[];
  /** Ordered pair such as (forecastYear, targetYear) or (startYear, endYear) */
  span?: readonly [number, number];
}

function sortedUnique<T extends string | number>(values: readonly T[]): T[] {
  return Array.from(new Set(values)).sort((a, b) =>
    typeof a === "number" && typeof b === "number"
      ? a - b
      : String(a).localeCompare(String(b))
  );
}

export function deriveCacheKey(input: CacheKeyInput): CacheKey {
  const sectors = sortedUnique(input.sectors ?? []);
  const sources = sortedUnique(input.sources ?? []);
  const years = sortedUnique(input.years ?? []);

  const parts = [
    input.operation,
    `sectors=${sectors.join(",")}`,
    `sources=${sources.join(",")}`,
    `years=${years.join(",")}`,
  ];
  if (input.span) parts.push(`span=${input.span[0]}->${input.span[1]}`);

  const mentioned = [...years, ...(input.span ?? [])];
  return mentioned.length > 0
    ? { id: parts.join("|"), latestYear: Math.max(...mentioned) }
    : { id: parts.join("|") };
}

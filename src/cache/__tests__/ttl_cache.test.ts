import { manualClock } from "../../util/clock";
import { deriveCacheKey } from "../cache_key";
import { fixedTtlPolicy, temporalTtlPolicy, TtlCache } from "../ttl_cache";

describe("deriveCacheKey", () => {
  it("is invariant under reordering and duplicates", () => {
    const a = deriveCacheKey({
      operation: "historical",
      sectors: ["Energy", "Economy"],
      sources: ["rbi", "world-bank", "rbi"],
      years: [2000, 1975],
    });
    const b = deriveCacheKey({
      operation: "historical",
      sectors: ["Economy", "Energy", "Energy"],
      sources: ["world-bank", "rbi"],
      years: [1975, 2000],
    });
    expect(a).toEqual(b);
    expect(a.id).toBe(
      "historical|sectors=Economy,Energy|sources=rbi,world-bank|years=1975,2000"
    );
    expect(a.latestYear).toBe(2000);
  });

  it("distinguishes operations", () => {
    const base = { sectors: ["Energy"], sources: ["rbi"], years: [2030] };
    expect(deriveCacheKey({ operation: "current", ...base }).id).not.toBe(
      deriveCacheKey({ operation: "historical", ...base }).id
    );
  });

  it("keeps the two years of a span in order", () => {
    const forward = deriveCacheKey({ operation: "historical", span: [2015, 2020] });
    const reversed = deriveCacheKey({ operation: "historical", span: [2020, 2015] });
    expect(forward).toEqual({
      id: "historical|sectors=|sources=|years=|span=2015->2020",
      latestYear: 2020,
    });
    expect(reversed.id).toBe("historical|sectors=|sources=|years=|span=2020->2015");
    expect(reversed.latestYear).toBe(2020);
  });

  it("omits latestYear when no years are given", () => {
    expect(deriveCacheKey({ operation: "registry" })).toEqual({
      id: "registry|sectors=|sources=|years=",
    });
  });
});

describe("TtlCache", () => {
  const key = deriveCacheKey({ operation: "actual", years: [2030] });

  it("serves hits without calling the fetch function", async () => {
    const clock = manualClock("2024-06-01T00:00:00Z");
    const cache = new TtlCache<number>({
      policy: fixedTtlPolicy(1000),
      clock,
    });
    const fetchFn = jest.fn(async (n: number) => n * 2);

    await expect(cache.getOrFetch(key, fetchFn, 21)).resolves.toBe(42);
    clock.advance(999);
    await expect(cache.getOrFetch(key, fetchFn, 99)).resolves.toBe(42);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(cache.stats()).toEqual({ size: 1, hits: 1, misses: 1, inFlight: 0 });
  });

  it("refetches once the TTL has elapsed", async () => {
    const clock = manualClock("2024-06-01T00:00:00Z");
    const cache = new TtlCache<number>({
      policy: fixedTtlPolicy(1000),
      clock,
    });
    const fetchFn = jest.fn(async (n: number) => n);

    await cache.getOrFetch(key, fetchFn, 1);
    clock.advance(1000);
    await expect(cache.getOrFetch(key, fetchFn, 2)).resolves.toBe(2);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("shares one in-flight fetch between concurrent misses", async () => {
    const cache = new TtlCache<string>({ policy: fixedTtlPolicy(1000) });
    let release: (value: string) => void = () => undefined;
    const fetchFn = jest.fn(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        })
    );

    const first = cache.getOrFetch(key, fetchFn);
    const second = cache.getOrFetch(key, fetchFn);
    expect(cache.stats().inFlight).toBe(1);

    await Promise.resolve();
    release("done");
    await expect(Promise.all([first, second])).resolves.toEqual([
      "done",
      "done",
    ]);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(cache.stats().inFlight).toBe(0);
  });

  it("does not cache failures and keeps the prior entry", async () => {
    const clock = manualClock("2024-06-01T00:00:00Z");
    const cache = new TtlCache<string>({
      policy: fixedTtlPolicy(1000),
      clock,
    });
    await cache.getOrFetch(key, async () => "old");
    clock.advance(5000);

    await expect(
      cache.getOrFetch(key, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(cache.stats().size).toBe(1);
    expect(cache.peek(key)).toBeUndefined();

    await expect(cache.getOrFetch(key, async () => "new")).resolves.toBe(
      "new"
    );
  });

  it("clears the in-flight slot when the fetch function throws synchronously", async () => {
    const cache = new TtlCache<string>({ policy: fixedTtlPolicy(1000) });
    await expect(
      cache.getOrFetch(key, () => {
        throw new Error("sync");
      })
    ).rejects.toThrow("sync");
    expect(cache.stats().inFlight).toBe(0);
  });

  it("stores null values as hits", async () => {
    const cache = new TtlCache<string | null>({
      policy: fixedTtlPolicy(1000),
    });
    const fetchFn = jest.fn(async () => null);
    await cache.getOrFetch(key, fetchFn);
    await expect(cache.getOrFetch(key, fetchFn)).resolves.toBeNull();
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("invalidate and clear drop entries", async () => {
    const cache = new TtlCache<number>({ policy: fixedTtlPolicy(1000) });
    await cache.getOrFetch(key, async () => 1);
    expect(cache.invalidate(key)).toBe(true);
    expect(cache.has(key)).toBe(false);
    await cache.getOrFetch(key, async () => 2);
    cache.clear();
    expect(cache.stats()).toEqual({ size: 0, hits: 0, misses: 0, inFlight: 0 });
  });
});

describe("temporalTtlPolicy", () => {
  const clock = manualClock("2024-06-01T00:00:00Z");
  const policy = temporalTtlPolicy({ liveTtlMs: 3_600_000, clock });

  it("never expires past-year keys by default", () => {
    expect(policy(deriveCacheKey({ operation: "actual", years: [2000] }))).toBe(
      Infinity
    );
  });

  it("uses the live TTL for the current year, future years and yearless keys", () => {
    expect(policy(deriveCacheKey({ operation: "actual", years: [2024] }))).toBe(
      3_600_000
    );
    expect(
      policy(deriveCacheKey({ operation: "current", years: [2019, 2030] }))
    ).toBe(3_600_000);
    expect(policy(deriveCacheKey({ operation: "registry" }))).toBe(3_600_000);
  });

  it("historical entries survive far beyond the live TTL", async () => {
    const localClock = manualClock("2024-06-01T00:00:00Z");
    const cache = new TtlCache<number>({
      policy: temporalTtlPolicy({ liveTtlMs: 1000, clock: localClock }),
      clock: localClock,
    });
    const past = deriveCacheKey({ operation: "actual", years: [2000] });
    const live = deriveCacheKey({ operation: "actual", years: [2030] });
    const fetchFn = jest.fn(async () => 7);

    await cache.getOrFetch(past, fetchFn);
    await cache.getOrFetch(live, fetchFn);
    localClock.advance(10_000_000);
    await cache.getOrFetch(past, fetchFn);
    await cache.getOrFetch(live, fetchFn);
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });
});

/**
 * Injected time source. Engines and the cache read "now" through a Clock so
 * tests can pin it.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function fixedClock(at: Date | string): Clock {
  const instant = typeof at === "string" ? new Date(at) : at;
  return { now: () => new Date(instant.getTime()) };
}

/**
 * Mutable clock for tests that need time to pass.
 */
export function manualClock(at: Date | string): Clock & {
  advance(ms: number): void;
  set(next: Date | string): void;
} {
  let current = (typeof at === "string" ? new Date(at) : at).getTime();
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
    set: (next: Date | string) => {
      current = (typeof next === "string" ? new Date(next) : next).getTime();
    },
  };
}

export function currentYear(clock: Clock): number {
  return clock.now().getUTCFullYear();
}

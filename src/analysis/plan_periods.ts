export interface EvaluationWindow {
  forecastYear: number;
  targetYear: number;
  label?: string;
}

/** Start years of the Five Year Plans; each ran five years. */
export const FIVE_YEAR_PLANS: ReadonlyArray<{ start: number; name: string }> = [
  { start: 1951, name: "First Five Year Plan" },
  { start: 1956, name: "Second Five Year Plan" },
  { start: 1961, name: "Third Five Year Plan" },
  { start: 1969, name: "Fourth Five Year Plan" },
  { start: 1974, name: "Fifth Five Year Plan" },
  { start: 1980, name: "Sixth Five Year Plan" },
  { start: 1985, name: "Seventh Five Year Plan" },
  { start: 1992, name: "Eighth Five Year Plan" },
  { start: 1997, name: "Ninth Five Year Plan" },
  { start: 2002, name: "Tenth Five Year Plan" },
  { start: 2007, name: "Eleventh Five Year Plan" },
  { start: 2012, name: "Twelfth Five Year Plan" },
];

export const PLAN_LENGTH_YEARS = 5;

export function planWindows(beforeYear: number): EvaluationWindow[] {
  return FIVE_YEAR_PLANS.map((plan) => ({
    forecastYear: plan.start,
    targetYear: plan.start + PLAN_LENGTH_YEARS,
    label: plan.name,
  })).filter((w) => w.targetYear < beforeYear);
}

/**
 * Evenly spaced windows [y, y + step] starting at `from`, all resolved before
 * `beforeYear`.
 */
export function steppedWindows(
  from: number,
  step: number,
  beforeYear: number
): EvaluationWindow[] {
  if (!Number.isInteger(step) || step <= 0) return [];
  const windows: EvaluationWindow[] = [];
  for (let year = from; year + step < beforeYear; year += step) {
    windows.push({ forecastYear: year, targetYear: year + step });
  }
  return windows;
}

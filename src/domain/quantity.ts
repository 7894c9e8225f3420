import type { Quantity } from "./types";

/**
 * Quantity and metric-name normalisation shared by fetchers and matching.
 *
 * Scale words are folded into the value (1 crore = 1e7, 1 lakh = 1e5) and
 * units are reduced to a small canonical set so forecasts and actuals from
 * different sources compare on the same footing.
 */

const SCALE_WORDS: Record<string, number> = {
  thousand: 1e3,
  lakh: 1e5,
  lakhs: 1e5,
  million: 1e6,
  crore: 1e7,
  crores: 1e7,
  billion: 1e9,
  trillion: 1e12,
};

interface UnitRule {
  unit: string;
  factor: number;
}

const UNIT_RULES: Record<string, UnitRule> = {
  "%": { unit: "%", factor: 1 },
  percent: { unit: "%", factor: 1 },
  "per cent": { unit: "%", factor: 1 },
  gw: { unit: "GW", factor: 1 },
  mw: { unit: "GW", factor: 1e-3 },
  km: { unit: "km", factor: 1 },
  kms: { unit: "km", factor: 1 },
  kilometres: { unit: "km", factor: 1 },
  kilometers: { unit: "km", factor: 1 },
  years: { unit: "years", factor: 1 },
  yrs: { unit: "years", factor: 1 },
  kt: { unit: "kt", factor: 1 },
  tonnes: { unit: "tonnes", factor: 1 },
  usd: { unit: "USD", factor: 1 },
  inr: { unit: "INR", factor: 1 },
  "sq km": { unit: "sq km", factor: 1 },
  "per 1000": { unit: "per 1000", factor: 1 },
};

const METRIC_ALIASES: Record<string, string> = {
  "gdp growth": "gdp growth rate",
  "gdp growth target": "gdp growth rate",
  "real gdp growth": "gdp growth rate",
  "renewable capacity": "renewable energy capacity",
  "renewable energy target": "renewable energy capacity",
  "power generation capacity": "installed power capacity",
  "national highway length": "highway length",
  "adult literacy rate": "literacy rate",
};

const NUMBER_PATTERN =
  /(-?\d[\d,]*(?:\.\d+)?)(?:\s*(?:-|–|to)\s*(-?\d[\d,]*(?:\.\d+)?))?/;

function toNumber(raw: string): number {
  return Number(raw.replace(/,/g, ""));
}

/**
 * Canonical unit plus the factor that converts into it. Unknown units pass
 * through lower-cased with factor 1.
 */
export function resolveUnit(raw: string): UnitRule {
  const key = raw.trim().toLowerCase().replace(/\s+/g, " ");
  if (key === "") return { unit: "", factor: 1 };
  return UNIT_RULES[key] ?? { unit: key, factor: 1 };
}

export function normalizeQuantity(quantity: Quantity): Quantity {
  const rule = resolveUnit(quantity.unit);
  return { value: quantity.value * rule.factor, unit: rule.unit };
}

/**
 * Best-effort parse of display strings such as "450 GW", "$5 Trillion",
 * "6.5-7.0%" or "146,000 km (2024)". Ranges collapse to their midpoint.
 */
export function parseQuantity(text: string): Quantity | null {
  const source = text.trim();
  const match = NUMBER_PATTERN.exec(source);
  if (!match) return null;

  const low = toNumber(match[1]);
  const high = match[2] !== undefined ? toNumber(match[2]) : low;
  if (!Number.isFinite(low) || !Number.isFinite(high)) return null;
  let value = (low + high) / 2;

  const before = source.slice(0, match.index).toLowerCase();
  const after = source.slice(match.index + match[0].length).toLowerCase();

  for (const word of after.match(/[a-z]+/g) ?? []) {
    const scale = SCALE_WORDS[word];
    if (scale === undefined) break;
    value *= scale;
  }

  let unit = "";
  if (/(\$|us\$|\busd\b)/.test(before) || /^\s*usd\b/.test(after)) {
    unit = "USD";
  } else if (/(₹|\brs\.?|\binr\b)/.test(before)) {
    unit = "INR";
  } else if (/^\s*(%|per\s?cent\b|percent\b)/.test(after)) {
    unit = "%";
  } else {
    const unitWord = after
      .replace(/\b(thousand|lakhs?|million|crores?|billion|trillion)\b/g, "")
      .match(/^\s*(sq km|per 1000|[a-z]+)/);
    if (unitWord) {
      const rule = UNIT_RULES[unitWord[1]];
      if (rule) {
        unit = rule.unit;
        value *= rule.factor;
      }
    }
  }

  return { value, unit };
}

/**
 * Lower-cased, punctuation-free, alias-folded metric name used for matching.
 */
export function normalizeMetric(metric: string): string {
  const cleaned = metric
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
  return METRIC_ALIASES[cleaned] ?? cleaned;
}

export function formatQuantity(quantity: Quantity): string {
  const { value, unit } = quantity;
  const rounded = Number.isInteger(value)
    ? String(value)
    : value.toFixed(2).replace(/\.?0+$/, "");
  if (unit === "") return rounded;
  if (unit === "%") return `${rounded}%`;
  if (unit === "USD") return `$${rounded}`;
  return `${rounded} ${unit}`;
}

import type { ChartPosition, PerformanceTier } from "./types";

export const DID_NOT_CHART = "-";

const NUMERIC_TEXT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Normalizes a raw `US_peak_chart_post` value. Anything that is not a finite
 * number or numeric text, including the "-" placeholder, becomes `null`.
 */
export function coercePosition(value: unknown): ChartPosition {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }
  const text = value.trim();
  if (text === DID_NOT_CHART || !NUMERIC_TEXT.test(text)) {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

// Upper bounds are inclusive; the first matching bracket wins.
const TIER_BRACKETS: Array<{ max: number; tier: PerformanceTier }> = [
  { max: 5, tier: "Top 5" },
  { max: 10, tier: "Top 10" },
  { max: 50, tier: "Top 50" }
];

export function classifyTier(position: ChartPosition): PerformanceTier {
  if (position === null) {
    return "No Chart";
  }
  for (const bracket of TIER_BRACKETS) {
    if (position <= bracket.max) {
      return bracket.tier;
    }
  }
  return "No Chart";
}

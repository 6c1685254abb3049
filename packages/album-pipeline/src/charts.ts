import type { FiveViews } from "./types";

export type ChartKind = "line" | "bar" | "scatter" | "heatmap" | "treemap";

export interface ChartHint {
  kind: ChartKind;
  title: string;
  xAxisTitle: string | null;
  yAxisTitle: string | null;
  /** Lower chart positions are better, so position axes run top-down. */
  reversedYAxis: boolean;
}

export const CHART_HINTS = {
  chartPerformance: {
    kind: "line",
    title: "Chart Performance Over Time",
    xAxisTitle: "Album",
    yAxisTitle: "Chart Position",
    reversedYAxis: true
  },
  releaseFrequency: {
    kind: "bar",
    title: "Album Release Frequency",
    xAxisTitle: "Year",
    yAxisTitle: "Number of Albums",
    reversedYAxis: false
  },
  yearVsPosition: {
    kind: "scatter",
    title: "Year vs Chart Position",
    xAxisTitle: "Year",
    yAxisTitle: "Chart Position",
    reversedYAxis: true
  },
  yearPositionGrid: {
    kind: "heatmap",
    title: "Year vs Chart Performance",
    xAxisTitle: "Year",
    yAxisTitle: "Chart Position",
    reversedYAxis: false
  },
  tierDistribution: {
    kind: "treemap",
    title: "Album Performance Distribution",
    xAxisTitle: null,
    yAxisTitle: null,
    reversedYAxis: false
  }
} as const satisfies Record<keyof FiveViews, ChartHint>;

export type ChartHints = typeof CHART_HINTS;

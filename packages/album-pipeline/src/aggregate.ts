import { InvalidRecordError } from "./errors";
import { classifyTier } from "./position";
import type {
  AlbumRow,
  AlbumTable,
  ChartPerformancePoint,
  ChartingRow,
  FiveViews,
  PerformanceTier,
  ReleaseFrequencyBin,
  TierCount,
  YearPositionGrid,
  YearPositionPoint
} from "./types";

export const GRID_ROW_LABEL = "Chart Position";

const INTEGER_TEXT = /^[+-]?\d+$/;

function describeValue(value: unknown): string {
  return value === undefined ? "missing" : JSON.stringify(value);
}

export function resolveYear(row: AlbumRow): number {
  const { year } = row;
  if (typeof year === "number" && Number.isInteger(year)) {
    return year;
  }
  if (typeof year === "string" && INTEGER_TEXT.test(year.trim())) {
    return Number(year.trim());
  }
  throw new InvalidRecordError(
    row.index,
    "year",
    `Record ${row.index} has an invalid year: ${describeValue(year)}`
  );
}

export function resolveAlbumLabel(row: AlbumRow): string {
  const { album } = row;
  if (typeof album === "string") {
    return album;
  }
  if (typeof album === "number" && Number.isFinite(album)) {
    return String(album);
  }
  throw new InvalidRecordError(
    row.index,
    "album",
    `Record ${row.index} has an invalid album: ${describeValue(album)}`
  );
}

/** Rows with a chart position, in table order. */
export function chartingSubset(table: AlbumTable): ChartingRow[] {
  return table.filter((row): row is ChartingRow => row.position !== null);
}

export function chartPerformanceSeries(charting: readonly ChartingRow[]): ChartPerformancePoint[] {
  return charting.map((row) => ({
    album: resolveAlbumLabel(row),
    position: row.position
  }));
}

export function releaseFrequency(table: AlbumTable): ReleaseFrequencyBin[] {
  const counts = new Map<number, number>();
  for (const row of table) {
    const year = resolveYear(row);
    counts.set(year, (counts.get(year) ?? 0) + 1);
  }
  return Array.from(counts, ([year, count]) => ({ year, count })).sort((a, b) => a.year - b.year);
}

export function yearPositionScatter(charting: readonly ChartingRow[]): YearPositionPoint[] {
  return charting.map((row) => ({
    year: resolveYear(row),
    position: row.position,
    album: resolveAlbumLabel(row)
  }));
}

// One column per charting album; albums sharing a year are not merged.
export function yearPositionGrid(charting: readonly ChartingRow[]): YearPositionGrid {
  return {
    rowLabel: GRID_ROW_LABEL,
    columns: charting.map(resolveYear),
    cells: charting.map((row) => row.position)
  };
}

/**
 * Counts every album per performance tier. Largest tier first; equal counts
 * keep the order in which the tiers first appear in the table.
 */
export function tierDistribution(table: AlbumTable): TierCount[] {
  const counts = new Map<PerformanceTier, number>();
  for (const row of table) {
    const tier = classifyTier(row.position);
    counts.set(tier, (counts.get(tier) ?? 0) + 1);
  }
  return Array.from(counts, ([tier, count]) => ({ tier, count })).sort((a, b) => b.count - a.count);
}

export function aggregate(table: AlbumTable): FiveViews {
  const charting = chartingSubset(table);
  return {
    chartPerformance: chartPerformanceSeries(charting),
    releaseFrequency: releaseFrequency(table),
    yearVsPosition: yearPositionScatter(charting),
    yearPositionGrid: yearPositionGrid(charting),
    tierDistribution: tierDistribution(table)
  };
}

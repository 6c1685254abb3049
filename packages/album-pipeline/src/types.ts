export type UploadPayload = string | Uint8Array;

/** Normalized peak chart position; `null` means the album did not chart. */
export type ChartPosition = number | null;

export interface AlbumRow {
  /** Position of the record in the uploaded collection. */
  index: number;
  album: unknown;
  year: unknown;
  position: ChartPosition;
}

export type AlbumTable = readonly AlbumRow[];

export interface ChartingRow extends AlbumRow {
  position: number;
}

export const PERFORMANCE_TIERS = ["Top 5", "Top 10", "Top 50", "No Chart"] as const;

export type PerformanceTier = (typeof PERFORMANCE_TIERS)[number];

export type ChartPerformancePoint = {
  album: string;
  position: number;
};

export type ReleaseFrequencyBin = {
  year: number;
  count: number;
};

export type YearPositionPoint = {
  year: number;
  position: number;
  album: string;
};

export type YearPositionGrid = {
  rowLabel: string;
  columns: number[];
  cells: number[];
};

export type TierCount = {
  tier: PerformanceTier;
  count: number;
};

export interface FiveViews {
  chartPerformance: ChartPerformancePoint[];
  releaseFrequency: ReleaseFrequencyBin[];
  yearVsPosition: YearPositionPoint[];
  yearPositionGrid: YearPositionGrid;
  tierDistribution: TierCount[];
}

export interface PipelineResult {
  views: FiveViews;
  error: string;
}

export * from "./types";
export * from "./errors";
export { DID_NOT_CHART, classifyTier, coercePosition } from "./position";
export { decodePayload, ingest, normalizeRecords, parseRecords } from "./ingest";
export {
  GRID_ROW_LABEL,
  aggregate,
  chartPerformanceSeries,
  chartingSubset,
  releaseFrequency,
  resolveAlbumLabel,
  resolveYear,
  tierDistribution,
  yearPositionGrid,
  yearPositionScatter
} from "./aggregate";
export { NO_UPLOAD_MESSAGE, describeFailure, emptyViews, runPipeline } from "./pipeline";
export type { RunPipelineOptions } from "./pipeline";
export { CHART_HINTS } from "./charts";
export type { ChartHint, ChartHints, ChartKind } from "./charts";

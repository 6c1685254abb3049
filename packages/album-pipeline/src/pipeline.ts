import { aggregate, GRID_ROW_LABEL } from "./aggregate";
import { ingest } from "./ingest";
import type { FiveViews, PipelineResult, UploadPayload } from "./types";

export const NO_UPLOAD_MESSAGE = "Please upload a JSON file";

export interface RunPipelineOptions {
  /** Called with the original error before it is folded into the result. */
  onFailure?: (error: unknown) => void;
}

export function emptyViews(): FiveViews {
  return {
    chartPerformance: [],
    releaseFrequency: [],
    yearVsPosition: [],
    yearPositionGrid: { rowLabel: GRID_ROW_LABEL, columns: [], cells: [] },
    tierDistribution: []
  };
}

export function describeFailure(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `Error processing file: ${message || "unknown error"}`;
}

/**
 * Runs ingestion and aggregation for one upload. Never throws: failures come
 * back as empty views with a non-empty `error`.
 */
export function runPipeline(
  payload: UploadPayload | null | undefined,
  options: RunPipelineOptions = {}
): PipelineResult {
  if (payload === null || payload === undefined || payload.length === 0) {
    return { views: emptyViews(), error: NO_UPLOAD_MESSAGE };
  }

  try {
    return { views: aggregate(ingest(payload)), error: "" };
  } catch (error) {
    try {
      options.onFailure?.(error);
    } catch {
      // the hook must not replace the original failure
    }
    return { views: emptyViews(), error: describeFailure(error) };
  }
}

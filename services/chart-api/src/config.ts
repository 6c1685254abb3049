const toInt = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

export const SERVICE_NAME = "chart-api";
export const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
export const CHART_API_PORT = toInt(process.env.CHART_API_PORT, 8300);
export const CHART_API_HOST = process.env.CHART_API_HOST ?? "0.0.0.0";
export const CHART_API_BODY_LIMIT_BYTES = clamp(
  toInt(process.env.CHART_API_BODY_LIMIT_BYTES, 10 * 1024 * 1024),
  1024,
  50 * 1024 * 1024
);
export const TELEMETRY_CONSOLE_EXPORT = (process.env.TELEMETRY_CONSOLE_EXPORT ?? "false").toLowerCase() === "true";

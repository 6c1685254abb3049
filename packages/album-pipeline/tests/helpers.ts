export function toDataUri(text: string, mime = "application/json"): string {
  return `data:${mime};base64,${Buffer.from(text, "utf8").toString("base64")}`;
}

export const SAMPLE_ALBUMS = [
  { album: "A", year: 2000, US_peak_chart_post: "3" },
  { album: "B", year: 2000, US_peak_chart_post: "-" },
  { album: "C", year: 2001, US_peak_chart_post: "7" }
];

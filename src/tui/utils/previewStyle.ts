import { TRUNCATED_LINE } from "../../transcripts/preview.js";

export interface LineStyle {
  color?: string;
  dim?: boolean;
}

/**
 * Colour a preview line by its direction marker.
 */
export function previewLineStyle(line: string): LineStyle {
  const body = line.trimStart();
  if (line === TRUNCATED_LINE) return { dim: true };
  if (body.startsWith("▶")) return { color: "blue" };
  if (body.startsWith("◀")) return { color: "green" };
  if (body.startsWith("\u{1f527}")) return { color: "yellow", dim: true };
  return {};
}

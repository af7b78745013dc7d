export const MAX_SUMMARY_LEN = 200;
export const CHARS_PER_TOKEN = 4;

const TAG_RE = /<[^>]+>/g;

/** Strip XML/HTML-ish tags and collapse whitespace runs to single spaces. */
export function cleanText(text: string): string {
  return text.replace(TAG_RE, "").split(/\s+/).filter(Boolean).join(" ");
}

export function toSummary(text: string): string {
  return cleanText(text).slice(0, MAX_SUMMARY_LEN);
}

export function estimateTokens(chars: number): number {
  return Math.floor(chars / CHARS_PER_TOKEN);
}

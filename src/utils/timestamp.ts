/**
 * Convert milliseconds to whole Unix seconds.
 */
export function unixMsToSeconds(ms: number): number {
  return Math.floor(ms / 1000);
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Format Unix seconds as local `YYYY-MM-DD HH:mm`.
 */
export function formatLocalMinute(seconds: number): string {
  const d = new Date(seconds * 1000);
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}`
  );
}

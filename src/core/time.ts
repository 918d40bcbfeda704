/*
Duration helpers for build summaries.
Inputs are millisecond durations from performance.now().
*/

function roundToDecimals(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return 0;
  return Number(value.toFixed(decimals));
}

export function secondsFromMs(durationMs: number): number {
  return roundToDecimals(durationMs / 1000, 3);
}

export function formatSeconds(durationMs: number): string {
  const seconds = Number.isFinite(durationMs) ? durationMs / 1000 : 0;
  return `${seconds.toFixed(2)} seconds`;
}

export function millisecondsFromSeconds(seconds: number | undefined): number | undefined {
  if (seconds === undefined) return undefined;
  return Math.round(seconds * 1000);
}

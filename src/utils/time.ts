export function nowUtcIsoSeconds(): string {
  const iso = new Date().toISOString();
  return iso.replace(/\.\d{3}Z$/, "Z");
}

/** Seconds since `startMs`, one decimal. */
export function elapsedSeconds(startMs: number, nowMs: number = Date.now()): string {
  return ((nowMs - startMs) / 1000).toFixed(1);
}

/** Writes one structured JSON line per event. */
export function logEvent(event: string, data: Record<string, unknown> = {}): void {
  console.log(JSON.stringify({
    event,
    ts: new Date().toISOString(),
    ...data,
  }));
}

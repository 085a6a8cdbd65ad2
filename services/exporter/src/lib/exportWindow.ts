const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Time range an export covers. Both ends are inclusive.
 */
export interface ExportWindow {
  readonly from: Date;
  readonly to: Date;
}

export function trailingWindow(now: Date, days: number): ExportWindow {
  return {
    from: new Date(now.getTime() - days * DAY_MS),
    to: new Date(now.getTime()),
  };
}

export function isWithinWindow(window: ExportWindow, timestamp: Date): boolean {
  const time = timestamp.getTime();
  return time >= window.from.getTime() && time <= window.to.getTime();
}

/**
 * UTC calendar date used in export file names, e.g. `2024-06-08`.
 */
export function formatDateStamp(date: Date): string {
  return date.toISOString().split('T')[0];
}

/**
 * Second-precision UTC timestamp (`2024-06-02T10:00:00Z`), the format the
 * Cloud Controller uses for `created_at` and accepts in timestamp filters.
 */
export function formatUtcSeconds(date: Date): string {
  const truncated = new Date(Math.floor(date.getTime() / 1000) * 1000);
  return truncated.toISOString().replace('.000Z', 'Z');
}

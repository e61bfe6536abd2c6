const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

export function hoursBetween(from: number, to: number, floor: number): number {
  return Math.max((to - from) / HOUR_MS, floor);
}

export function startOfUtcDay(at: number): number {
  const d = new Date(at);
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
}

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

// wall-clock hour (0-23) at `at` in the given IANA zone
export function localHour(at: number, timezone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', { timeZone: timezone, hour: 'numeric', hourCycle: 'h23' }).formatToParts(
    new Date(at)
  );
  const hour = parts.find((part) => part.type === 'hour');
  return hour ? Number.parseInt(hour.value, 10) % 24 : new Date(at).getUTCHours();
}

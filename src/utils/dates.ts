const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * UTC calendar day of a timestamp (YYYY-MM-DD)
 */
export function toUtcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function addUtcDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function subtractHours(date: Date, hours: number): Date {
  return new Date(date.getTime() - hours * 60 * 60 * 1000);
}

/**
 * `count` consecutive UTC days ending on the day of `end`, newest first
 */
export function trailingUtcDays(end: Date, count: number): string[] {
  const last = startOfUtcDay(end);
  return Array.from({ length: count }, (_, i) => toUtcDay(addUtcDays(last, -i)));
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

export type WindowBoundary = 'start' | 'end';

/**
 * Normalize a window bound to an ISO 8601 UTC timestamp.
 *
 * A bare `YYYY-MM-DD` covers the whole day: the start of it for `since`, the
 * last millisecond of it for `until`. Returns null when unparseable.
 */
export function normalizeDateBound(value: string, boundary: WindowBoundary): string | null {
  const trimmed = value.trim();
  if (DATE_ONLY.test(trimmed)) {
    const day = new Date(`${trimmed}T00:00:00.000Z`);
    if (Number.isNaN(day.getTime()) || day.toISOString().slice(0, 10) !== trimmed) {
      return null;
    }
    if (boundary === 'end') {
      day.setUTCHours(23, 59, 59, 999);
    }
    return day.toISOString();
  }

  const time = Date.parse(trimmed);
  if (Number.isNaN(time)) return null;
  return new Date(time).toISOString();
}

export function toDateOnly(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// Device clocks write "YYYY-MM-DD HH:MM:SS(.fff)" without an offset; those are UTC.
const NAIVE_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

function validDate(ms: number): Date | null {
  const date = new Date(ms);
  // Dates past ±8.64e15 ms are Invalid Date even for finite input.
  return Number.isFinite(date.getTime()) ? date : null;
}

export function parseInstant(value: unknown): Date | null {
  if (value instanceof Date) return validDate(value.getTime());
  if (typeof value === 'number') return validDate(value);
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (!trimmed) return null;
  const naive = NAIVE_TIMESTAMP.exec(trimmed);
  const normalized = naive ? `${naive[1]}T${naive[2]}Z` : trimmed;
  return validDate(Date.parse(normalized));
}

export function secondsBetween(start: Date, end: Date) {
  return (end.getTime() - start.getTime()) / 1000;
}

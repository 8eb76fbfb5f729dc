// src/parser/date.ts

const MONTHS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const;

export const isDateToken = (token: string): boolean => /^[0-9]{8}$/.test(token);

/**
 * `"20250101"` → `"Jan 1, 2025"`.
 * Returns null for anything that is not eight digits with month 1-12 and
 * day 1-31; days are not checked against the calendar.
 */
export function formatDate(raw: string | null | undefined): string | null {
  if (!raw || !isDateToken(raw)) return null;

  const year = raw.slice(0, 4);
  const month = Number(raw.slice(4, 6));
  const day = Number(raw.slice(6, 8));

  const name = MONTHS[month - 1];
  if (name === undefined) return null;
  if (day < 1 || day > 31) return null;

  return `${name} ${day}, ${year}`;
}

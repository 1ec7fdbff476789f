/**
 * Calendar-date helpers. Dates are stored as UTC midnight.
 */

export const toUtcDate = (value: Date): Date =>
  new Date(Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate()));

/**
 * Parse an ISO string, or pass a Date through; undefined when absent or invalid
 */
export const parseDateTime = (value: string | Date | null | undefined): Date | undefined => {
  if (value === null || value === undefined || value === '') return undefined;
  const parsed = value instanceof Date ? value : new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
};

/**
 * Like parseDateTime, truncated to the UTC calendar date
 */
export const parseUtcDate = (value: string | Date | null | undefined): Date | undefined => {
  const parsed = parseDateTime(value);
  return parsed && toUtcDate(parsed);
};

/**
 * yyyy-MM-dd
 */
export const formatIsoDate = (value: Date): string => value.toISOString().slice(0, 10);

/**
 * Converts a Date to an ISO trading-day string (YYYY-MM-DD).
 */
export const toIsoDate = (value: Date): string =>
  value.toISOString().slice(0, 10);

/**
 * Reads the date part of provider timestamps such as `2026-01-05 16:00:00` or `2026-01-05T00:00:00+0000`.
 */
export const tradingDayFromTimestamp = (
  raw: string | undefined,
): string | undefined => {
  const match = raw?.trim().match(/^(\d{4}-\d{2}-\d{2})/);
  return match?.[1];
};

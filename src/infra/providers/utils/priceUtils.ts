/**
 * Accepts the numeric-or-string price fields providers emit and rejects anything that is not a positive finite number.
 */
export const parsePrice = (raw: unknown): number | null => {
  if (typeof raw === "number") {
    return Number.isFinite(raw) && raw > 0 ? raw : null;
  }

  if (typeof raw !== "string") {
    return null;
  }

  const normalized = raw.trim();
  if (!normalized) {
    return null;
  }

  const parsed = Number.parseFloat(normalized);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
};

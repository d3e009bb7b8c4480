/** Boolean parser for query parameters and flags with a default fallback. */
export const parseBoolean = (value: unknown, defaultValue = false): boolean => {
  if (typeof value === "boolean") return value;
  const text = String(value ?? "");
  if (/^(1|true|yes|on)$/i.test(text)) return true;
  if (/^(0|false|no|off)$/i.test(text)) return false;
  return defaultValue;
};

/** Positive integer or the fallback. */
export const parsePositiveInt = (value: unknown, fallback: number): number => {
  const parsed = Number.parseInt(String(value ?? ""), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

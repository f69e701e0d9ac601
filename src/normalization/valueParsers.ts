const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);
const SNOWFLAKE_RE = /^\d+$/;
const ID_LIST_SPLIT_RE = /[\n,]/g;

export function parseBooleanFlag(value: unknown, fallback = false) {
  const normalized = String(value || "")
    .trim()
    .toLowerCase();
  if (!normalized) return Boolean(fallback);
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return Boolean(fallback);
}

export function parseNumberOrFallback(value: unknown, fallback: number) {
  if (value === undefined || value === null || String(value).trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Returns the snowflake id as a string, or "" when the value is absent,
 * not all digits, or zero. Zero ids disable whatever they configure.
 */
export function parseSnowflake(value: unknown) {
  const normalized = String(value ?? "").trim();
  if (!SNOWFLAKE_RE.test(normalized)) return "";
  const withoutLeadingZeros = normalized.replace(/^0+/, "");
  return withoutLeadingZeros;
}

export function parseSnowflakeList(value: unknown): string[] {
  if (typeof value !== "string" || !value.trim()) return [];
  const ids = value
    .split(ID_LIST_SPLIT_RE)
    .map((entry) => parseSnowflake(entry))
    .filter(Boolean);
  return [...new Set(ids)];
}

/**
 * Canonical JSON: sorted keys, no whitespace, deterministic output.
 * Two documents with the same content render identically regardless of the
 * order their tables were declared in.
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (typeof value === "bigint") return `${value}n`;
  if (value instanceof Date) return JSON.stringify(value.toISOString());

  if (Array.isArray(value)) {
    return "[" + value.map(canonicalize).join(",") + "]";
  }

  if (typeof value === "object") {
    const entries = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, v]) => JSON.stringify(key) + ":" + canonicalize(v));
    return "{" + entries.join(",") + "}";
  }

  return String(value);
}

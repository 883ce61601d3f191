export function normalizeUsername(value: string): string {
  return value.trim().replace(/^@/, "").toLowerCase();
}

export function slugify(value: string, fallback = "export"): string {
  const slug = value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/^[-._]+|[-._]+$/g, "");
  return slug || fallback;
}

export function asInt(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? Math.trunc(parsed) : 0;
  }
  return 0;
}

export function asStr(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed || null;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): Record<string, unknown> | null {
  return isRecord(value) ? value : null;
}

export function asRecordArray(value: unknown): Array<Record<string, unknown>> {
  if (!Array.isArray(value)) return [];
  const out: Array<Record<string, unknown>> = [];
  for (const item of value) {
    const record = asRecord(item);
    if (record) out.push(record);
  }
  return out;
}

export function firstTruthy(...values: unknown[]): unknown {
  for (const value of values) {
    if (value !== undefined && value !== null && value !== "" && value !== 0) return value;
  }
  return undefined;
}

/**
 * Accepts epoch seconds, epoch milliseconds, numeric strings or ISO strings
 * and returns an ISO-8601 UTC instant.
 */
export function toUtcIso(value: unknown): string | null {
  if (value === null || value === undefined) return null;

  let seconds: number | null = null;
  if (typeof value === "number" && Number.isFinite(value)) {
    seconds = value;
  } else if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) return null;
    const numeric = Number(trimmed);
    if (Number.isFinite(numeric)) {
      seconds = numeric;
    } else {
      const parsed = Date.parse(trimmed);
      return Number.isNaN(parsed) ? null : new Date(parsed).toISOString();
    }
  }

  if (seconds === null || seconds <= 0) return null;
  if (seconds > 1_000_000_000_000) seconds = seconds / 1000;
  return new Date(Math.round(seconds * 1000)).toISOString();
}

export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

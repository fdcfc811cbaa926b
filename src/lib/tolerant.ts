// Field readers for loosely typed generator payloads. Each returns undefined for a field
// that is missing or unusable; none substitutes a placeholder value.

export type RawObject = Record<string, unknown>;

export function isRecord(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

export function optionalNumber(value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'number' && typeof value !== 'string') return undefined;
  const num = Number(value);
  return Number.isFinite(num) ? num : undefined;
}

/** Counts (missions flown, victories, losses): whole and non-negative, or undefined. */
export function optionalCount(value: unknown): number | undefined {
  const num = optionalNumber(value);
  return num !== undefined && num >= 0 ? Math.floor(num) : undefined;
}

/** Serial numbers and squadron ids arrive as numbers or strings depending on version. */
export function optionalId(value: unknown): string | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : undefined;
  }
  return optionalString(value);
}

export function coalesce<T>(...values: (T | null | undefined)[]): T | undefined {
  for (const value of values) {
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

export function firstField<T>(
  source: RawObject,
  keys: readonly string[],
  read: (value: unknown) => T | undefined
): T | undefined {
  for (const key of keys) {
    const value = read(source[key]);
    if (value !== undefined) return value;
  }
  return undefined;
}

export function objectAt(source: RawObject, key: string): RawObject | undefined {
  const value = source[key];
  return isRecord(value) ? value : undefined;
}

/** Accepts either an array or an id-keyed map of objects. */
export function recordList(value: unknown): RawObject[] {
  if (Array.isArray(value)) return value.filter(isRecord);
  if (isRecord(value)) return Object.values(value).filter(isRecord);
  return [];
}

export function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const result: string[] = [];
  for (const entry of value) {
    const text = optionalString(entry) ?? (isRecord(entry) ? optionalString(entry.name) : undefined);
    if (text) result.push(text);
  }
  return result;
}

/** Reads altitudes written as a bare number or as text such as "1500 meters" or "5000 ft". */
export function parseAltitudeMeters(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string') return undefined;
  const match = value.match(/-?\d+(?:[.,]\d+)?/);
  if (!match) return undefined;
  const amount = Number(match[0].replace(',', '.'));
  if (!Number.isFinite(amount)) return undefined;
  return /\b(ft|feet|foot)\b/i.test(value) ? Math.round(amount * 0.3048) : amount;
}

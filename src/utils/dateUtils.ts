/**
 * Timestamp parsing for loosely formatted plugin output
 *
 * Strategies are tried in a fixed order and the first that yields a valid
 * date wins. Zone-less values are read as UTC.
 */

type Strategy = (value: string) => Date | null;

const ISO_WITH_ZONE = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i;
const ISO_LOCAL = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?$/;
const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const SLASHED = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const NUMERIC = /^-?\d+(\.\d+)?$/;

/** Epoch values above this magnitude are milliseconds, below it seconds */
const EPOCH_MS_THRESHOLD = 1e11;

function buildUtc(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  ms = 0
): Date | null {
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, ms));
  // Date.UTC maps years 0-99 onto 1900-1999
  date.setUTCFullYear(year);
  return date;
}

function fraction(value: string | undefined): number {
  return value ? Math.round(Number(value) * 1000) : 0;
}

const isoWithZone: Strategy = (value) => {
  const match = ISO_WITH_ZONE.exec(value);
  if (!match) return null;
  const [, y, mo, d, h, mi, s, frac, zone] = match;
  const base = buildUtc(+y, +mo, +d, +h, +mi, s ? +s : 0, fraction(frac));
  if (!base) return null;
  if (zone.toUpperCase() === 'Z') return base;

  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const offsetMinutes = sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
  return new Date(base.getTime() - offsetMinutes * 60_000);
};

const isoLocal: Strategy = (value) => {
  const match = ISO_LOCAL.exec(value);
  if (!match) return null;
  const [, y, mo, d, h, mi, s, frac] = match;
  return buildUtc(+y, +mo, +d, +h, +mi, s ? +s : 0, fraction(frac));
};

const dateOnly: Strategy = (value) => {
  const match = DATE_ONLY.exec(value);
  if (!match) return null;
  const [, y, mo, d] = match;
  return buildUtc(+y, +mo, +d);
};

const dayFirst: Strategy = (value) => {
  const match = SLASHED.exec(value);
  if (!match) return null;
  const [, d, mo, y] = match;
  return buildUtc(+y, +mo, +d);
};

const monthFirst: Strategy = (value) => {
  const match = SLASHED.exec(value);
  if (!match) return null;
  const [, mo, d, y] = match;
  return buildUtc(+y, +mo, +d);
};

const epochString: Strategy = (value) => {
  if (!NUMERIC.test(value)) return null;
  return fromEpoch(Number(value));
};

const STRATEGIES: Strategy[] = [isoWithZone, isoLocal, dateOnly, dayFirst, monthFirst, epochString];

/**
 * Convert a Unix epoch number (seconds or milliseconds) to a date
 */
export function fromEpoch(value: number): Date | null {
  if (!Number.isFinite(value)) {
    return null;
  }
  const ms = Math.abs(value) > EPOCH_MS_THRESHOLD ? value : value * 1000;
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Parse a timestamp value of unknown type; null when no strategy applies
 */
export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'number') {
    return fromEpoch(value);
  }
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  for (const strategy of STRATEGIES) {
    const parsed = strategy(trimmed);
    if (parsed) {
      return parsed;
    }
  }
  return null;
}

/**
 * RFC 3339 in UTC with second precision, e.g. 2024-01-02T00:00:00Z
 */
export function toRfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

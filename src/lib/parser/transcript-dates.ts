import { normalizeWhitespace } from "@/lib/utils/transcript";

const MONTH_BY_ABBREVIATION: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12
};

const ISO_DATE_REGEX = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/;
const DAY_FIRST_NUMERIC_REGEX = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{2}|\d{4})$/;
const DAY_FIRST_MONTH_NAME_REGEX = /^(\d{1,2})[\s/-]+([A-Za-z]{3,9})[\s/,-]+(\d{2}|\d{4})$/;

const SYNTHETIC_ANCHOR_MS = Date.UTC(2000, 0, 1);
const DAY_MS = 24 * 60 * 60 * 1000;

function expandYear(raw: string): number {
  const year = Number(raw);
  return raw.length === 2 ? 2000 + year : year;
}

function buildUtcDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  // Rejects 31/02 and friends, which Date.UTC silently rolls over.
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Parses a transcript date cell. Numeric dates are read day-first, the way
 * result declarations are printed; ISO dates are read year-first.
 */
export function parseTranscriptDate(value: string | undefined): Date | null {
  if (!value) {
    return null;
  }
  const normalized = normalizeWhitespace(value);
  if (!normalized) {
    return null;
  }

  const iso = normalized.match(ISO_DATE_REGEX);
  if (iso) {
    return buildUtcDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const numeric = normalized.match(DAY_FIRST_NUMERIC_REGEX);
  if (numeric) {
    return buildUtcDate(expandYear(numeric[3]), Number(numeric[2]), Number(numeric[1]));
  }

  const named = normalized.match(DAY_FIRST_MONTH_NAME_REGEX);
  if (named) {
    const month = MONTH_BY_ABBREVIATION[named[2].slice(0, 3).toLowerCase()];
    if (month === undefined) {
      return null;
    }
    return buildUtcDate(expandYear(named[3]), month, Number(named[1]));
  }

  return null;
}

/**
 * Strictly decreasing timestamps in row order: the first row reads as the
 * most recent, so "keep the latest" falls back to "keep the first".
 */
export function syntheticTimestamps(count: number): number[] {
  return Array.from({ length: count }, (_, index) => SYNTHETIC_ANCHOR_MS - index * DAY_MS);
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

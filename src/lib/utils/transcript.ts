export function normalizeWhitespace(value: string): string {
  return value
    .replace(/[\u200b-\u200d\ufeff]/g, "")
    .replace(/\u00a0/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function isBlankCell(value: string | undefined): boolean {
  return value === undefined || normalizeWhitespace(value) === "";
}

// Plain decimal notation only; Number() would also read "0x10" or "0b11".
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function parseCreditNumber(value: string | undefined): number | null {
  if (!value) {
    return null;
  }

  let candidate = normalizeWhitespace(value);
  if (!candidate) {
    return null;
  }
  if (candidate.includes(",") && candidate.includes(".")) {
    candidate = candidate.replace(/,/g, "");
  } else if (candidate.includes(",")) {
    candidate = candidate.replace(",", ".");
  }

  if (!DECIMAL_PATTERN.test(candidate)) {
    return null;
  }
  const numeric = Number(candidate);
  return Number.isFinite(numeric) ? numeric : null;
}

export function normalizeCourseCode(value: string): string {
  return normalizeWhitespace(value);
}

/** Lowercase, alphanumeric only. Deduplication key, never displayed. */
export function normalizeCourseTitle(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, "");
}

export function normalizeGradeCell(value: string): string {
  return normalizeWhitespace(value).toUpperCase();
}

export function normalizeHeaderLabel(value: string): string {
  return normalizeWhitespace(value).toLowerCase();
}

export function roundForDisplay(value: number, digits = 2): number {
  return Number(value.toFixed(digits));
}

import type { DateColumnLabel, RawRow, TranscriptColumnKey } from "@/types/grades";
import { normalizeHeaderLabel } from "@/lib/utils/transcript";

export const REQUIRED_COLUMN_LABELS = {
  courseCode: "Course Code",
  title: "Course Title",
  credits: "Credits",
  grade: "Grade"
} as const;

// First match wins when a table carries more than one.
export const DATE_COLUMN_LABELS: readonly DateColumnLabel[] = ["Date", "Result Declared On"];

export interface HeaderMatch {
  rowIndex: number;
  labels: string[];
}

export interface ColumnMap {
  indexes: Partial<Record<TranscriptColumnKey, number>>;
  dateColumn: DateColumnLabel | null;
}

export function isHeaderRow(row: RawRow): boolean {
  const labels = row.map(normalizeHeaderLabel);
  return (
    labels.includes(normalizeHeaderLabel(REQUIRED_COLUMN_LABELS.courseCode)) &&
    labels.includes(normalizeHeaderLabel(REQUIRED_COLUMN_LABELS.grade))
  );
}

export function findHeaderRow(rows: readonly RawRow[]): HeaderMatch | null {
  const rowIndex = rows.findIndex(isHeaderRow);
  if (rowIndex === -1) {
    return null;
  }
  return { rowIndex, labels: rows[rowIndex].map(normalizeHeaderLabel) };
}

function indexOfLabel(labels: readonly string[], label: string): number | undefined {
  const index = labels.indexOf(normalizeHeaderLabel(label));
  return index === -1 ? undefined : index;
}

export function buildColumnMap(labels: readonly string[]): ColumnMap {
  const indexes: Partial<Record<TranscriptColumnKey, number>> = {
    courseCode: indexOfLabel(labels, REQUIRED_COLUMN_LABELS.courseCode),
    title: indexOfLabel(labels, REQUIRED_COLUMN_LABELS.title),
    credits: indexOfLabel(labels, REQUIRED_COLUMN_LABELS.credits),
    grade: indexOfLabel(labels, REQUIRED_COLUMN_LABELS.grade)
  };

  let dateColumn: DateColumnLabel | null = null;
  for (const label of DATE_COLUMN_LABELS) {
    const index = indexOfLabel(labels, label);
    if (index !== undefined) {
      indexes.date = index;
      dateColumn = label;
      break;
    }
  }

  return { indexes, dateColumn };
}

export function readCell(row: RawRow, index: number | undefined): string | undefined {
  if (index === undefined) {
    return undefined;
  }
  return row[index];
}

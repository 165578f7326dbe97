import type {
  CourseRecord,
  DropReason,
  DroppedRow,
  NormalizedTranscript,
  RawRow
} from "@/types/grades";
import { HeaderNotFoundError } from "@/lib/errors";
import { isGradeSymbol } from "@/lib/domain/grade-scale";
import { buildColumnMap, findHeaderRow, readCell, type ColumnMap } from "@/lib/parser/column-mapping";
import { parseTranscriptDate, syntheticTimestamps } from "@/lib/parser/transcript-dates";
import {
  isBlankCell,
  normalizeCourseCode,
  normalizeCourseTitle,
  normalizeGradeCell,
  normalizeWhitespace,
  parseCreditNumber
} from "@/lib/utils/transcript";

export type StageResult<T> = { ok: true; value: T } | { ok: false; reason: DropReason };

interface SelectedRow {
  rowIndex: number;
  cells: string[];
  courseCode: string;
  title: string;
  creditsRaw: string;
  gradeRaw: string;
  dateRaw?: string;
}

interface CreditedRow extends SelectedRow {
  credits: number;
  normalizedTitle: string;
}

interface DatedRow extends CreditedRow {
  recordedDate?: Date;
  sortTimestamp: number;
}

const DROP_WARNINGS: Record<DropReason, (count: number) => string> = {
  missing_field: (count) => `${count} row(s) dropped for a missing course code, title, credits or grade.`,
  invalid_credits: (count) => `${count} row(s) dropped because credits were not numeric.`,
  non_positive_credits: (count) => `${count} row(s) dropped because credits were zero or negative.`,
  invalid_date: (count) => `${count} row(s) dropped because the date could not be read.`,
  duplicate_title: (count) => `${count} earlier attempt(s) superseded by a more recent row of the same course.`,
  invalid_grade: (count) => `${count} row(s) dropped for an unrecognized grade.`
};

const DROP_REASON_ORDER: DropReason[] = [
  "missing_field",
  "invalid_credits",
  "non_positive_credits",
  "invalid_date",
  "duplicate_title",
  "invalid_grade"
];

export function selectColumns(row: RawRow, rowIndex: number, columns: ColumnMap): StageResult<SelectedRow> {
  const { indexes } = columns;
  const courseCode = readCell(row, indexes.courseCode);
  const title = readCell(row, indexes.title);
  const creditsRaw = readCell(row, indexes.credits);
  const gradeRaw = readCell(row, indexes.grade);

  if (
    courseCode === undefined ||
    title === undefined ||
    creditsRaw === undefined ||
    gradeRaw === undefined ||
    [courseCode, title, creditsRaw, gradeRaw].some((cell) => isBlankCell(cell))
  ) {
    return { ok: false, reason: "missing_field" };
  }

  return {
    ok: true,
    value: {
      rowIndex,
      cells: [...row],
      courseCode: normalizeCourseCode(courseCode),
      title: normalizeWhitespace(title),
      creditsRaw,
      gradeRaw,
      dateRaw: readCell(row, indexes.date)
    }
  };
}

export function coerceCredits(row: SelectedRow): StageResult<CreditedRow> {
  const numeric = parseCreditNumber(row.creditsRaw);
  if (numeric === null) {
    return { ok: false, reason: "invalid_credits" };
  }

  const credits = Math.trunc(numeric);
  if (credits <= 0) {
    return { ok: false, reason: "non_positive_credits" };
  }

  return { ok: true, value: { ...row, credits, normalizedTitle: normalizeCourseTitle(row.title) } };
}

export function resolveRecordedDate(row: CreditedRow): StageResult<DatedRow> {
  const recordedDate = parseTranscriptDate(row.dateRaw);
  if (!recordedDate) {
    return { ok: false, reason: "invalid_date" };
  }
  return { ok: true, value: { ...row, recordedDate, sortTimestamp: recordedDate.getTime() } };
}

function compareRecency(a: DatedRow, b: DatedRow): number {
  return b.sortTimestamp - a.sortTimestamp || a.rowIndex - b.rowIndex;
}

/**
 * One row per normalized title: latest date wins, earliest row breaks ties.
 * Survivors come back most recent first.
 */
export function dedupeByTitle(rows: readonly DatedRow[]): { kept: DatedRow[]; superseded: DatedRow[] } {
  const winners = new Map<string, DatedRow>();
  const superseded: DatedRow[] = [];

  for (const row of rows) {
    const current = winners.get(row.normalizedTitle);
    if (!current) {
      winners.set(row.normalizedTitle, row);
      continue;
    }
    if (compareRecency(row, current) < 0) {
      superseded.push(current);
      winners.set(row.normalizedTitle, row);
    } else {
      superseded.push(row);
    }
  }

  return {
    kept: [...winners.values()].sort(compareRecency),
    superseded: superseded.sort((a, b) => a.rowIndex - b.rowIndex)
  };
}

export function filterGrade(row: DatedRow): StageResult<CourseRecord> {
  const grade = normalizeGradeCell(row.gradeRaw);
  if (!isGradeSymbol(grade)) {
    return { ok: false, reason: "invalid_grade" };
  }

  const record: CourseRecord = {
    courseCode: row.courseCode,
    title: row.title,
    credits: row.credits,
    grade
  };
  if (row.recordedDate) {
    record.recordedDate = row.recordedDate;
  }
  return { ok: true, value: record };
}

function buildWarnings(droppedRows: readonly DroppedRow[], recordCount: number): string[] {
  const counts = new Map<DropReason, number>();
  for (const dropped of droppedRows) {
    counts.set(dropped.reason, (counts.get(dropped.reason) ?? 0) + 1);
  }

  const warnings = DROP_REASON_ORDER.filter((reason) => counts.has(reason)).map((reason) =>
    DROP_WARNINGS[reason](counts.get(reason) ?? 0)
  );
  if (recordCount === 0) {
    warnings.push("No course records survived normalization.");
  }
  return warnings;
}

export function normalizeTranscript(rawRows: readonly RawRow[]): NormalizedTranscript {
  const header = findHeaderRow(rawRows);
  if (!header) {
    throw new HeaderNotFoundError(rawRows.length);
  }

  const columns = buildColumnMap(header.labels);
  const droppedRows: DroppedRow[] = [];
  const drop = (rowIndex: number, reason: DropReason, cells: readonly string[]) => {
    droppedRows.push({ rowIndex, reason, cells: [...cells] });
  };

  const credited: CreditedRow[] = [];
  for (let rowIndex = header.rowIndex + 1; rowIndex < rawRows.length; rowIndex += 1) {
    const row = rawRows[rowIndex];
    const selected = selectColumns(row, rowIndex, columns);
    if (!selected.ok) {
      drop(rowIndex, selected.reason, row);
      continue;
    }
    const withCredits = coerceCredits(selected.value);
    if (!withCredits.ok) {
      drop(rowIndex, withCredits.reason, row);
      continue;
    }
    credited.push(withCredits.value);
  }

  let dated: DatedRow[];
  if (columns.dateColumn) {
    dated = [];
    for (const row of credited) {
      const resolved = resolveRecordedDate(row);
      if (!resolved.ok) {
        drop(row.rowIndex, resolved.reason, row.cells);
        continue;
      }
      dated.push(resolved.value);
    }
  } else {
    const timestamps = syntheticTimestamps(credited.length);
    dated = credited.map((row, index) => ({ ...row, sortTimestamp: timestamps[index] }));
  }

  const { kept, superseded } = dedupeByTitle(dated);
  superseded.forEach((row) => drop(row.rowIndex, "duplicate_title", row.cells));

  const records: CourseRecord[] = [];
  for (const row of kept) {
    const graded = filterGrade(row);
    if (!graded.ok) {
      drop(row.rowIndex, graded.reason, row.cells);
      continue;
    }
    records.push(graded.value);
  }

  droppedRows.sort((a, b) => a.rowIndex - b.rowIndex);

  return {
    records,
    headerRowIndex: header.rowIndex,
    dateColumn: columns.dateColumn,
    droppedRows,
    warnings: buildWarnings(droppedRows, records.length)
  };
}

export function normalize(rawRows: readonly RawRow[]): CourseRecord[] {
  return normalizeTranscript(rawRows).records;
}

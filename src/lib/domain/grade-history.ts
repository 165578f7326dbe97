import type { CgpaHistoryPoint, CourseRecord, PointGrade } from "@/types/grades";
import { GRADE_POINTS, isPointGrade } from "@/lib/domain/grade-scale";
import { formatIsoDate } from "@/lib/parser/transcript-dates";

type DatedGradedRecord = CourseRecord & { grade: PointGrade; recordedDate: Date };

function isDatedGradedRecord(record: CourseRecord): record is DatedGradedRecord {
  return record.recordedDate !== undefined && isPointGrade(record.grade);
}

/**
 * Running CGPA after each dated, graded course, oldest first. Transcripts
 * without a date column have no history and yield an empty series.
 */
export function cumulativeCgpaHistory(records: readonly CourseRecord[]): CgpaHistoryPoint[] {
  const ordered = records
    .filter(isDatedGradedRecord)
    .map((record, index) => ({ record, index }))
    .sort((a, b) => a.record.recordedDate.getTime() - b.record.recordedDate.getTime() || a.index - b.index);

  let cumulativeCredits = 0;
  let cumulativePoints = 0;

  return ordered.map(({ record }) => {
    cumulativeCredits += record.credits;
    cumulativePoints += record.credits * GRADE_POINTS[record.grade];
    return {
      date: formatIsoDate(record.recordedDate),
      courseCode: record.courseCode,
      cumulativeCredits,
      cumulativePoints,
      cgpa: cumulativePoints / cumulativeCredits
    };
  });
}

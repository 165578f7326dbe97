import type { CourseRecord, Distribution, GradeSymbol, PointGrade, TranscriptSummary } from "@/types/grades";
import { GRADE_SYMBOL_VALUES, POINT_GRADE_VALUES } from "@/lib/domain/grade-scale";
import type { GradeLedger } from "@/lib/domain/grade-ledger";

/** Percentage of point-grade credits held by each grade. P is left out, as in the CGPA. */
export function distributionShares(distribution: Distribution): Record<PointGrade, number> {
  const total = POINT_GRADE_VALUES.reduce((sum, grade) => sum + (distribution[grade] ?? 0), 0);
  const shares = { S: 0, A: 0, B: 0, C: 0, D: 0, E: 0, F: 0 } satisfies Record<PointGrade, number>;
  if (total <= 0) {
    return shares;
  }
  for (const grade of POINT_GRADE_VALUES) {
    shares[grade] = ((distribution[grade] ?? 0) / total) * 100;
  }
  return shares;
}

export function buildTranscriptSummary(ledger: GradeLedger): TranscriptSummary {
  const coursesByGrade: Array<{ grade: GradeSymbol; courses: CourseRecord[] }> = [];
  for (const grade of GRADE_SYMBOL_VALUES) {
    const courses = ledger.recordsWithGrade(grade);
    if (courses.length > 0) {
      coursesByGrade.push({ grade, courses });
    }
  }

  return {
    totalCourses: ledger.courseCount,
    totalCredits: ledger.aggregates.totalCredits,
    cgpa: ledger.cgpa,
    distribution: ledger.distribution,
    shares: distributionShares(ledger.distribution),
    coursesByGrade
  };
}

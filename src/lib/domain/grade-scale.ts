import type { GradeSymbol, PointGrade } from "@/types/grades";

export const GRADE_SYMBOL_VALUES = ["S", "A", "B", "C", "D", "E", "F", "P"] as const;

// Highest first; also the enumeration order used by the target planner.
export const POINT_GRADE_VALUES = ["S", "A", "B", "C", "D", "E", "F"] as const;

export const GRADE_POINTS: Readonly<Record<PointGrade, number>> = Object.freeze({
  S: 10,
  A: 9,
  B: 8,
  C: 7,
  D: 6,
  E: 5,
  F: 0
});

export const MAX_GRADE_POINT = GRADE_POINTS.S;

const GRADE_SYMBOL_SET: ReadonlySet<string> = new Set(GRADE_SYMBOL_VALUES);
const POINT_GRADE_SET: ReadonlySet<string> = new Set(POINT_GRADE_VALUES);

export function isGradeSymbol(value: string | undefined): value is GradeSymbol {
  return value !== undefined && GRADE_SYMBOL_SET.has(value);
}

export function isPointGrade(value: string | undefined): value is PointGrade {
  return value !== undefined && POINT_GRADE_SET.has(value);
}

export function gradePoint(grade: PointGrade): number {
  return GRADE_POINTS[grade];
}

/** Position on the F < E < D < C < B < A < S ladder, 0 for F. */
export function gradeRank(grade: PointGrade): number {
  return POINT_GRADE_VALUES.length - 1 - POINT_GRADE_VALUES.indexOf(grade);
}

import type { CgpaAggregates, CourseRecord, Distribution, GradeSymbol, PointGrade } from "@/types/grades";
import { GRADE_POINTS, GRADE_SYMBOL_VALUES, isPointGrade } from "@/lib/domain/grade-scale";

function isGradedRecord(record: CourseRecord): record is CourseRecord & { grade: PointGrade } {
  return isPointGrade(record.grade);
}

/** Credits and credit-weighted points over every non-P record. Integers in, integers out. */
export function cgpaAggregates(records: readonly CourseRecord[]): CgpaAggregates {
  let totalCredits = 0;
  let totalPoints = 0;
  for (const record of records) {
    if (!isGradedRecord(record)) {
      continue;
    }
    totalCredits += record.credits;
    totalPoints += record.credits * GRADE_POINTS[record.grade];
  }
  return { totalCredits, totalPoints };
}

export function calculateCGPA(records: readonly CourseRecord[]): number {
  const { totalCredits, totalPoints } = cgpaAggregates(records);
  return totalCredits > 0 ? totalPoints / totalCredits : 0;
}

export function freezeDistribution(entries: Iterable<[GradeSymbol, number]>): Distribution {
  const output: Partial<Record<GradeSymbol, number>> = {};
  const totals = new Map(entries);
  // Canonical S..P key order keeps equal distributions deep-equal and printable.
  for (const grade of GRADE_SYMBOL_VALUES) {
    const credits = totals.get(grade);
    if (credits !== undefined && credits > 0) {
      output[grade] = credits;
    }
  }
  return Object.freeze(output);
}

export function distributionEntries(distribution: Distribution): Array<[GradeSymbol, number]> {
  return GRADE_SYMBOL_VALUES.flatMap((grade): Array<[GradeSymbol, number]> => {
    const credits = distribution[grade];
    return credits === undefined ? [] : [[grade, credits]];
  });
}

/** Credits per grade over all records, P included. Zero totals are left out. */
export function gradeDistribution(records: readonly CourseRecord[]): Distribution {
  const totals = new Map<GradeSymbol, number>();
  for (const record of records) {
    totals.set(record.grade, (totals.get(record.grade) ?? 0) + record.credits);
  }
  return freezeDistribution(totals);
}

export function totalDistributionCredits(distribution: Distribution): number {
  return distributionEntries(distribution).reduce((sum, [, credits]) => sum + credits, 0);
}

export function cgpaFromDistribution(distribution: Distribution): number {
  let totalCredits = 0;
  let totalPoints = 0;
  for (const [grade, credits] of distributionEntries(distribution)) {
    if (!isPointGrade(grade)) {
      continue;
    }
    totalCredits += credits;
    totalPoints += credits * GRADE_POINTS[grade];
  }
  return totalCredits > 0 ? totalPoints / totalCredits : 0;
}

export const cgpa = calculateCGPA;
export const distribution = gradeDistribution;

export class GradeLedger {
  readonly records: readonly CourseRecord[];
  readonly cgpa: number;
  readonly distribution: Distribution;
  readonly aggregates: Readonly<CgpaAggregates>;

  private constructor(records: readonly CourseRecord[]) {
    this.records = Object.freeze(records.map((record) => Object.freeze({ ...record })));
    this.aggregates = Object.freeze(cgpaAggregates(this.records));
    this.cgpa = calculateCGPA(this.records);
    this.distribution = gradeDistribution(this.records);
  }

  static fromRecords(records: readonly CourseRecord[]): GradeLedger {
    return new GradeLedger(records);
  }

  get courseCount(): number {
    return this.records.length;
  }

  recordsWithGrade(grade: GradeSymbol): CourseRecord[] {
    return this.records.filter((record) => record.grade === grade);
  }
}

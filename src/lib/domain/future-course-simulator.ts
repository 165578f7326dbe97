import type { Distribution, FutureCourseAddition, GradeSymbol } from "@/types/grades";
import { InvalidAdditionError } from "@/lib/errors";
import { isPointGrade } from "@/lib/domain/grade-scale";
import { distributionEntries, freezeDistribution } from "@/lib/domain/grade-ledger";

export function simulateFuture(distribution: Distribution, additions: readonly FutureCourseAddition[]): Distribution {
  const working = new Map<GradeSymbol, number>(distributionEntries(distribution));

  additions.forEach((addition, index) => {
    const { grade, credits } = addition;
    if (!isPointGrade(grade)) {
      throw new InvalidAdditionError(index, addition, "unknown_grade", "grade must be one of S, A, B, C, D, E, F.");
    }
    // Zero or negative credits would shrink the total instead of adding a course.
    if (!Number.isFinite(credits) || credits <= 0) {
      throw new InvalidAdditionError(index, addition, "non_positive_credits", "credits must be a positive number.");
    }
    working.set(grade, (working.get(grade) ?? 0) + credits);
  });

  return freezeDistribution(working);
}

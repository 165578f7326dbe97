import type { Distribution, GradeConversion, GradeSymbol } from "@/types/grades";
import { InvalidConversionError } from "@/lib/errors";
import { isPointGrade } from "@/lib/domain/grade-scale";
import { distributionEntries, freezeDistribution } from "@/lib/domain/grade-ledger";

// Residues below this come from float subtraction, not from the transcript.
const CREDIT_EPSILON = 1e-9;

/**
 * Moves credits between grades, one conversion at a time, each checked against
 * the state left by the ones before it. The whole batch succeeds or throws;
 * `distribution` is never touched.
 */
export function simulateImprovement(distribution: Distribution, operations: readonly GradeConversion[]): Distribution {
  const working = new Map<GradeSymbol, number>(distributionEntries(distribution));

  operations.forEach((operation, index) => {
    const { from, to, credits } = operation;
    if (!isPointGrade(from) || !isPointGrade(to)) {
      throw new InvalidConversionError(index, operation, "unknown_grade", "grades must be one of S, A, B, C, D, E, F.");
    }
    if (!Number.isFinite(credits) || credits <= 0) {
      throw new InvalidConversionError(index, operation, "non_positive_credits", "credits must be a positive number.");
    }

    const available = working.get(from) ?? 0;
    if (credits > available + CREDIT_EPSILON) {
      throw new InvalidConversionError(
        index,
        operation,
        "insufficient_credits",
        `only ${available} credit(s) available in grade ${from}.`
      );
    }

    const remaining = available - credits;
    working.set(from, remaining < CREDIT_EPSILON ? 0 : remaining);
    working.set(to, (working.get(to) ?? 0) + credits);
  });

  return freezeDistribution(working);
}

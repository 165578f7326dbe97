import type {
  GradeAssignment,
  PlanningBucket,
  PointGrade,
  PredictedCourse,
  PredictedProjection,
  TargetPlan,
  TargetPlanInput
} from "@/types/grades";
import { getPlannerConfig, type PlannerConfig } from "@/lib/config";
import {
  BucketLimitError,
  DivisionGuardError,
  InvalidBucketError,
  InvalidGradeError,
  InvalidTargetError
} from "@/lib/errors";
import { GRADE_POINTS, POINT_GRADE_VALUES, isPointGrade } from "@/lib/domain/grade-scale";

function assertFiniteAggregate(value: number, label: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${label} must be a finite, non-negative number (got ${value}).`);
  }
}

function validateBuckets(buckets: readonly PlanningBucket[]): number {
  buckets.forEach((bucket, index) => {
    if (!Number.isFinite(bucket.credits)) {
      throw new InvalidBucketError(index, bucket.credits);
    }
  });

  const totalFutureCredits = buckets.reduce((sum, bucket) => sum + bucket.credits, 0);
  if (buckets.length === 0 || totalFutureCredits <= 0) {
    throw new DivisionGuardError("future credit buckets");
  }

  buckets.forEach((bucket, index) => {
    if (bucket.credits <= 0) {
      throw new InvalidBucketError(index, bucket.credits);
    }
  });

  return totalFutureCredits;
}

/**
 * Average grade point the future credits must reach for the target. Values
 * above 10 mean the target is out of reach; values at or below 0 mean any
 * grade will do.
 */
export function calculateRequiredAverage(
  targetCgpa: number,
  currentTotalCredits: number,
  currentTotalPoints: number,
  totalFutureCredits: number
): number {
  if (!(totalFutureCredits > 0)) {
    throw new DivisionGuardError("future credits");
  }
  return (targetCgpa * (currentTotalCredits + totalFutureCredits) - currentTotalPoints) / totalFutureCredits;
}

function* enumerateGradeIndexes(bucketCount: number): Generator<number[]> {
  const indexes = new Array<number>(bucketCount).fill(0);
  while (true) {
    yield indexes;

    // Odometer: the last bucket turns fastest, matching a nested-loop product.
    let cursor = bucketCount - 1;
    while (cursor >= 0 && indexes[cursor] === POINT_GRADE_VALUES.length - 1) {
      indexes[cursor] = 0;
      cursor -= 1;
    }
    if (cursor < 0) {
      return;
    }
    indexes[cursor] += 1;
  }
}

/**
 * Enumerates every S..F assignment over the buckets and keeps the ones that
 * reach the target, weakest first.
 *
 * Cost is O(7^k) in the bucket count k. Requests above `maxBuckets` (from
 * CGPA_PLANNER_MAX_BUCKETS, default 7) throw {@link BucketLimitError}; pass a
 * higher `maxBuckets` to opt in. When even all-S misses the target, nothing is
 * enumerated: raising any single grade never lowers the projection.
 *
 * Configuration warnings are copied onto the plan when the limit came from
 * the configuration.
 */
export function planTarget(input: TargetPlanInput, config: PlannerConfig = getPlannerConfig()): TargetPlan {
  const { targetCgpa, currentTotalCredits, currentTotalPoints, buckets } = input;
  if (!Number.isFinite(targetCgpa)) {
    throw new InvalidTargetError(targetCgpa);
  }
  assertFiniteAggregate(currentTotalCredits, "currentTotalCredits");
  assertFiniteAggregate(currentTotalPoints, "currentTotalPoints");

  const totalFutureCredits = validateBuckets(buckets);
  const maxBuckets = input.maxBuckets ?? config.maxBuckets;
  const warnings = input.maxBuckets === undefined ? [...config.warnings] : [];
  if (buckets.length > maxBuckets) {
    throw new BucketLimitError(buckets.length, maxBuckets);
  }

  const requiredAverage = calculateRequiredAverage(targetCgpa, currentTotalCredits, currentTotalPoints, totalFutureCredits);
  const denominator = currentTotalCredits + totalFutureCredits;
  const pointsByBucket = buckets.map((bucket) => POINT_GRADE_VALUES.map((grade) => bucket.credits * GRADE_POINTS[grade]));
  const projectIndexes = (indexes: readonly number[]): { futurePoints: number; projectedCgpa: number } => {
    let futurePoints = 0;
    for (let bucket = 0; bucket < indexes.length; bucket += 1) {
      futurePoints += pointsByBucket[bucket][indexes[bucket]];
    }
    return { futurePoints, projectedCgpa: (currentTotalPoints + futurePoints) / denominator };
  };

  // Summed per bucket like the enumeration: the bound is exactly the all-S projection.
  const maxAchievableCgpa = projectIndexes(buckets.map(() => 0)).projectedCgpa;
  const feasible = maxAchievableCgpa >= targetCgpa;
  const searchSpaceSize = POINT_GRADE_VALUES.length ** buckets.length;

  const assignments: GradeAssignment[] = [];
  if (feasible) {
    for (const indexes of enumerateGradeIndexes(buckets.length)) {
      const { futurePoints, projectedCgpa } = projectIndexes(indexes);
      if (projectedCgpa >= targetCgpa) {
        assignments.push({
          grades: indexes.map((index) => POINT_GRADE_VALUES[index]),
          futurePoints,
          projectedCgpa
        });
      }
    }

    // Array#sort is stable, so ties keep enumeration order.
    assignments.sort((a, b) => a.projectedCgpa - b.projectedCgpa);
  }

  return {
    targetCgpa,
    requiredAverage,
    totalFutureCredits,
    maxAchievableCgpa,
    feasible,
    enumerated: feasible,
    searchSpaceSize,
    assignments,
    warnings
  };
}

export function projectCgpaForGrades(
  currentTotalCredits: number,
  currentTotalPoints: number,
  buckets: readonly PlanningBucket[],
  grades: readonly PointGrade[]
): number {
  if (grades.length !== buckets.length) {
    throw new RangeError(`Expected ${buckets.length} grade(s), got ${grades.length}.`);
  }
  const futureCredits = buckets.reduce((sum, bucket) => sum + bucket.credits, 0);
  const denominator = currentTotalCredits + futureCredits;
  if (!(denominator > 0)) {
    throw new DivisionGuardError("projected credits");
  }
  const futurePoints = buckets.reduce((sum, bucket, index) => sum + bucket.credits * GRADE_POINTS[grades[index]], 0);
  return (currentTotalPoints + futurePoints) / denominator;
}

/** Course-by-course mode: one predicted grade per planned course. */
export function projectWithPredictedGrades(
  currentTotalCredits: number,
  currentTotalPoints: number,
  courses: readonly PredictedCourse[]
): PredictedProjection {
  assertFiniteAggregate(currentTotalCredits, "currentTotalCredits");
  assertFiniteAggregate(currentTotalPoints, "currentTotalPoints");

  const rows = courses.map((course, index) => {
    const grade = course.grade.trim().toUpperCase();
    if (!isPointGrade(grade)) {
      throw new InvalidGradeError(course.grade, `predicted course "${course.label}"`);
    }
    if (!Number.isFinite(course.credits) || course.credits <= 0) {
      throw new InvalidBucketError(index, course.credits);
    }
    const gradePoint = GRADE_POINTS[grade];
    return { label: course.label, credits: course.credits, grade, gradePoint, points: course.credits * gradePoint };
  });

  const futureCredits = rows.reduce((sum, row) => sum + row.credits, 0);
  const futurePoints = rows.reduce((sum, row) => sum + row.points, 0);
  const denominator = currentTotalCredits + futureCredits;
  if (!(denominator > 0)) {
    throw new DivisionGuardError("projected credits");
  }

  return {
    rows,
    futureCredits,
    futurePoints,
    projectedCgpa: (currentTotalPoints + futurePoints) / denominator
  };
}

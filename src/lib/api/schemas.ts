import { z } from "zod";

import { GRADE_SYMBOL_VALUES } from "@/lib/domain/grade-scale";
import { HARD_MAX_PLANNER_BUCKETS } from "@/lib/config";

const gradeField = z.string().trim().toUpperCase();

export const distributionSchema = z
  .record(z.enum(GRADE_SYMBOL_VALUES), z.number().finite().nonnegative())
  .refine((value) => Object.keys(value).length > 0, { message: "distribution must list at least one grade" });

export const normalizeRequestSchema = z.object({
  rows: z.array(z.array(z.string())).min(1)
});

// Grades stay plain strings here; the simulators own the grade rules and
// report the offending operation by index.
export const improvementRequestSchema = z.object({
  distribution: distributionSchema,
  operations: z
    .array(
      z.object({
        from: gradeField,
        to: gradeField,
        credits: z.number()
      })
    )
    .min(1)
});

export const futureRequestSchema = z.object({
  distribution: distributionSchema,
  additions: z
    .array(
      z.object({
        grade: gradeField,
        credits: z.number()
      })
    )
    .min(1)
});

export const planRequestSchema = z.object({
  targetCgpa: z.number().finite().min(0).max(10),
  currentTotalCredits: z.number().finite().nonnegative(),
  currentTotalPoints: z.number().finite().nonnegative(),
  buckets: z
    .array(
      z.object({
        label: z.string().trim().min(1).optional(),
        credits: z.number()
      })
    )
    .min(1),
  maxBuckets: z.number().int().min(1).max(HARD_MAX_PLANNER_BUCKETS).optional()
});

export const predictRequestSchema = z.object({
  currentTotalCredits: z.number().finite().nonnegative(),
  currentTotalPoints: z.number().finite().nonnegative(),
  courses: z
    .array(
      z.object({
        label: z.string().trim().min(1),
        credits: z.number(),
        grade: gradeField
      })
    )
    .min(1)
});

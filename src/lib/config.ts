import { z } from "zod";

// 7^7 = 823,543 assignments; one more bucket multiplies that by seven.
export const DEFAULT_MAX_PLANNER_BUCKETS = 7;
// Every sufficient assignment is kept in memory; 7^8 is the most that fits.
export const HARD_MAX_PLANNER_BUCKETS = 8;

const plannerEnvSchema = z.object({
  CGPA_PLANNER_MAX_BUCKETS: z.coerce.number().int().min(1).max(HARD_MAX_PLANNER_BUCKETS).optional()
});

export interface PlannerConfig {
  maxBuckets: number;
  warnings: string[];
}

export function loadPlannerConfig(env: NodeJS.ProcessEnv = process.env): PlannerConfig {
  const raw = env.CGPA_PLANNER_MAX_BUCKETS?.trim();
  if (!raw) {
    return { maxBuckets: DEFAULT_MAX_PLANNER_BUCKETS, warnings: [] };
  }

  const parsed = plannerEnvSchema.safeParse({ CGPA_PLANNER_MAX_BUCKETS: raw });
  if (!parsed.success || parsed.data.CGPA_PLANNER_MAX_BUCKETS === undefined) {
    return {
      maxBuckets: DEFAULT_MAX_PLANNER_BUCKETS,
      warnings: [
        `CGPA_PLANNER_MAX_BUCKETS="${raw}" ignored: expected an integer from 1 to ${HARD_MAX_PLANNER_BUCKETS}. Using ${DEFAULT_MAX_PLANNER_BUCKETS}.`
      ]
    };
  }

  return { maxBuckets: parsed.data.CGPA_PLANNER_MAX_BUCKETS, warnings: [] };
}

let cachedConfig: PlannerConfig | undefined;

/** Reads the environment once per process. */
export function getPlannerConfig(): PlannerConfig {
  cachedConfig ??= loadPlannerConfig();
  return cachedConfig;
}

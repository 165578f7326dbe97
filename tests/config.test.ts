import { afterEach, describe, expect, it, vi } from "vitest";

import { DEFAULT_MAX_PLANNER_BUCKETS, loadPlannerConfig } from "@/lib/config";

describe("planner config", () => {
  it("defaults the bucket limit when the variable is unset or blank", () => {
    expect(loadPlannerConfig({})).toEqual({ maxBuckets: DEFAULT_MAX_PLANNER_BUCKETS, warnings: [] });
    expect(loadPlannerConfig({ CGPA_PLANNER_MAX_BUCKETS: "  " })).toEqual({ maxBuckets: 7, warnings: [] });
  });

  it("reads an override from the environment", () => {
    expect(loadPlannerConfig({ CGPA_PLANNER_MAX_BUCKETS: "8" })).toEqual({ maxBuckets: 8, warnings: [] });
  });

  it("falls back with a warning on values outside the allowed range", () => {
    const config = loadPlannerConfig({ CGPA_PLANNER_MAX_BUCKETS: "25" });

    expect(config.maxBuckets).toBe(7);
    expect(config.warnings).toEqual([
      'CGPA_PLANNER_MAX_BUCKETS="25" ignored: expected an integer from 1 to 8. Using 7.'
    ]);
    expect(loadPlannerConfig({ CGPA_PLANNER_MAX_BUCKETS: "many" }).maxBuckets).toBe(7);
    expect(loadPlannerConfig({ CGPA_PLANNER_MAX_BUCKETS: "9" }).maxBuckets).toBe(7);
  });

  describe("process configuration", () => {
    afterEach(() => {
      vi.unstubAllEnvs();
      vi.resetModules();
    });

    it("reads the environment once and reports its warnings on planner results", async () => {
      vi.stubEnv("CGPA_PLANNER_MAX_BUCKETS", "lots");
      vi.resetModules();
      const { getPlannerConfig } = await import("@/lib/config");
      const { handlePlanRequest } = await import("@/lib/api/handlers");

      const response = handlePlanRequest({
        targetCgpa: 8,
        currentTotalCredits: 10,
        currentTotalPoints: 80,
        buckets: [{ credits: 3 }]
      });

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        warnings: ['CGPA_PLANNER_MAX_BUCKETS="lots" ignored: expected an integer from 1 to 8. Using 7.']
      });

      vi.stubEnv("CGPA_PLANNER_MAX_BUCKETS", "3");
      expect(getPlannerConfig().maxBuckets).toBe(7);
    });
  });
});

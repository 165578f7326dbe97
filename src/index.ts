export * from "@/types/grades";
export * from "@/lib/errors";
export {
  DEFAULT_MAX_PLANNER_BUCKETS,
  HARD_MAX_PLANNER_BUCKETS,
  getPlannerConfig,
  loadPlannerConfig,
  type PlannerConfig
} from "@/lib/config";
export {
  GRADE_POINTS,
  GRADE_SYMBOL_VALUES,
  MAX_GRADE_POINT,
  POINT_GRADE_VALUES,
  gradePoint,
  gradeRank,
  isGradeSymbol,
  isPointGrade
} from "@/lib/domain/grade-scale";
export { normalize, normalizeTranscript, type StageResult } from "@/lib/parser/transcript-normalizer";
export { parseTranscriptDate } from "@/lib/parser/transcript-dates";
export {
  GradeLedger,
  calculateCGPA,
  cgpa,
  cgpaAggregates,
  cgpaFromDistribution,
  distribution,
  gradeDistribution,
  totalDistributionCredits
} from "@/lib/domain/grade-ledger";
export { simulateImprovement } from "@/lib/domain/improvement-simulator";
export { simulateFuture } from "@/lib/domain/future-course-simulator";
export {
  calculateRequiredAverage,
  planTarget,
  projectCgpaForGrades,
  projectWithPredictedGrades
} from "@/lib/domain/target-planner";
export { cumulativeCgpaHistory } from "@/lib/domain/grade-history";
export { buildTranscriptSummary, distributionShares } from "@/lib/domain/transcript-summary";
export { roundForDisplay } from "@/lib/utils/transcript";
export * from "@/lib/api/handlers";

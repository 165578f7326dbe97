export type GradeSymbol = "S" | "A" | "B" | "C" | "D" | "E" | "F" | "P";

export type PointGrade = Exclude<GradeSymbol, "P">;

export type RawRow = readonly string[];

export interface CourseRecord {
  courseCode: string;
  title: string;
  credits: number;
  grade: GradeSymbol;
  recordedDate?: Date;
}

export type Distribution = Readonly<Partial<Record<GradeSymbol, number>>>;

export type TranscriptColumnKey = "courseCode" | "title" | "credits" | "grade" | "date";

export type DateColumnLabel = "Date" | "Result Declared On";

export type DropReason =
  | "missing_field"
  | "invalid_credits"
  | "non_positive_credits"
  | "invalid_date"
  | "duplicate_title"
  | "invalid_grade";

export interface DroppedRow {
  rowIndex: number;
  reason: DropReason;
  cells: string[];
}

export interface NormalizedTranscript {
  records: CourseRecord[];
  headerRowIndex: number;
  dateColumn: DateColumnLabel | null;
  droppedRows: DroppedRow[];
  warnings: string[];
}

export interface CgpaAggregates {
  totalCredits: number;
  totalPoints: number;
}

export interface GradeConversion {
  from: string;
  to: string;
  credits: number;
}

export interface FutureCourseAddition {
  grade: string;
  credits: number;
}

export interface PlanningBucket {
  label?: string;
  credits: number;
}

export interface GradeAssignment {
  grades: PointGrade[];
  futurePoints: number;
  projectedCgpa: number;
}

export interface TargetPlanInput {
  targetCgpa: number;
  currentTotalCredits: number;
  currentTotalPoints: number;
  buckets: PlanningBucket[];
  maxBuckets?: number;
}

export interface TargetPlan {
  targetCgpa: number;
  requiredAverage: number;
  totalFutureCredits: number;
  maxAchievableCgpa: number;
  feasible: boolean;
  enumerated: boolean;
  searchSpaceSize: number;
  assignments: GradeAssignment[];
  warnings: string[];
}

export interface PredictedCourse {
  label: string;
  credits: number;
  grade: string;
}

export interface PredictedCourseRow {
  label: string;
  credits: number;
  grade: PointGrade;
  gradePoint: number;
  points: number;
}

export interface PredictedProjection {
  rows: PredictedCourseRow[];
  futureCredits: number;
  futurePoints: number;
  projectedCgpa: number;
}

export interface CgpaHistoryPoint {
  date: string;
  courseCode: string;
  cumulativeCredits: number;
  cumulativePoints: number;
  cgpa: number;
}

export interface TranscriptSummary {
  totalCourses: number;
  totalCredits: number;
  cgpa: number;
  distribution: Distribution;
  shares: Record<PointGrade, number>;
  coursesByGrade: Array<{ grade: GradeSymbol; courses: CourseRecord[] }>;
}

import type { ZodError, ZodIssue } from "zod";

import type {
  CgpaHistoryPoint,
  CourseRecord,
  DateColumnLabel,
  Distribution,
  DroppedRow,
  PredictedProjection,
  TargetPlan,
  TranscriptSummary
} from "@/types/grades";
import { isCgpaError } from "@/lib/errors";
import {
  futureRequestSchema,
  improvementRequestSchema,
  normalizeRequestSchema,
  planRequestSchema,
  predictRequestSchema
} from "@/lib/api/schemas";
import { GradeLedger, cgpaFromDistribution } from "@/lib/domain/grade-ledger";
import { simulateImprovement } from "@/lib/domain/improvement-simulator";
import { simulateFuture } from "@/lib/domain/future-course-simulator";
import { planTarget, projectWithPredictedGrades } from "@/lib/domain/target-planner";
import { buildTranscriptSummary } from "@/lib/domain/transcript-summary";
import { cumulativeCgpaHistory } from "@/lib/domain/grade-history";
import { normalizeTranscript } from "@/lib/parser/transcript-normalizer";
import { formatIsoDate } from "@/lib/parser/transcript-dates";

export interface ErrorBody {
  error: string;
  code?: string;
  details?: string;
  issues?: ZodIssue[];
}

export type HandlerResponse<T> = { status: 200; body: T } | { status: 400 | 422 | 500; body: ErrorBody };

export interface SerializedCourseRecord extends Omit<CourseRecord, "recordedDate"> {
  recordedDate: string | null;
}

export interface NormalizeResponseBody {
  records: SerializedCourseRecord[];
  summary: Omit<TranscriptSummary, "coursesByGrade">;
  history: CgpaHistoryPoint[];
  headerRowIndex: number;
  dateColumn: DateColumnLabel | null;
  droppedRows: DroppedRow[];
  warnings: string[];
}

export interface SimulationResponseBody {
  distribution: Distribution;
  originalCgpa: number;
  projectedCgpa: number;
}

function serializeRecord(record: CourseRecord): SerializedCourseRecord {
  return {
    courseCode: record.courseCode,
    title: record.title,
    credits: record.credits,
    grade: record.grade,
    recordedDate: record.recordedDate ? formatIsoDate(record.recordedDate) : null
  };
}

function invalidPayload(message: string, error: ZodError): HandlerResponse<never> {
  return { status: 400, body: { error: message, issues: error.issues } };
}

function failure(message: string, error: unknown): HandlerResponse<never> {
  if (isCgpaError(error)) {
    return { status: 422, body: { error: message, code: error.code, details: error.message } };
  }
  return { status: 500, body: { error: message, details: (error as Error).message } };
}

export function handleNormalizeRequest(payload: unknown): HandlerResponse<NormalizeResponseBody> {
  const parsed = normalizeRequestSchema.safeParse(payload);
  if (!parsed.success) {
    return invalidPayload("Invalid transcript payload.", parsed.error);
  }

  try {
    const normalized = normalizeTranscript(parsed.data.rows);
    const ledger = GradeLedger.fromRecords(normalized.records);
    const { totalCourses, totalCredits, cgpa, distribution, shares } = buildTranscriptSummary(ledger);

    return {
      status: 200,
      body: {
        records: ledger.records.map(serializeRecord),
        summary: { totalCourses, totalCredits, cgpa, distribution, shares },
        history: cumulativeCgpaHistory(ledger.records),
        headerRowIndex: normalized.headerRowIndex,
        dateColumn: normalized.dateColumn,
        droppedRows: normalized.droppedRows,
        warnings: normalized.warnings
      }
    };
  } catch (error) {
    return failure("Failed to normalize the transcript.", error);
  }
}

export function handleImprovementRequest(payload: unknown): HandlerResponse<SimulationResponseBody> {
  const parsed = improvementRequestSchema.safeParse(payload);
  if (!parsed.success) {
    return invalidPayload("Invalid improvement payload.", parsed.error);
  }

  try {
    const { distribution, operations } = parsed.data;
    const next = simulateImprovement(distribution, operations);
    return {
      status: 200,
      body: {
        distribution: next,
        originalCgpa: cgpaFromDistribution(distribution),
        projectedCgpa: cgpaFromDistribution(next)
      }
    };
  } catch (error) {
    return failure("Grade improvement rejected.", error);
  }
}

export function handleFutureRequest(payload: unknown): HandlerResponse<SimulationResponseBody> {
  const parsed = futureRequestSchema.safeParse(payload);
  if (!parsed.success) {
    return invalidPayload("Invalid future courses payload.", parsed.error);
  }

  try {
    const { distribution, additions } = parsed.data;
    const next = simulateFuture(distribution, additions);
    return {
      status: 200,
      body: {
        distribution: next,
        originalCgpa: cgpaFromDistribution(distribution),
        projectedCgpa: cgpaFromDistribution(next)
      }
    };
  } catch (error) {
    return failure("Future courses rejected.", error);
  }
}

export function handlePlanRequest(payload: unknown): HandlerResponse<TargetPlan> {
  const parsed = planRequestSchema.safeParse(payload);
  if (!parsed.success) {
    return invalidPayload("Invalid target plan payload.", parsed.error);
  }

  try {
    return { status: 200, body: planTarget(parsed.data) };
  } catch (error) {
    return failure("Target plan could not be computed.", error);
  }
}

export function handlePredictRequest(payload: unknown): HandlerResponse<PredictedProjection> {
  const parsed = predictRequestSchema.safeParse(payload);
  if (!parsed.success) {
    return invalidPayload("Invalid predicted grades payload.", parsed.error);
  }

  try {
    const { currentTotalCredits, currentTotalPoints, courses } = parsed.data;
    return { status: 200, body: projectWithPredictedGrades(currentTotalCredits, currentTotalPoints, courses) };
  } catch (error) {
    return failure("Predicted grades could not be projected.", error);
  }
}

import type { FutureCourseAddition, GradeConversion } from "@/types/grades";

export type CgpaErrorCode =
  | "HEADER_NOT_FOUND"
  | "INVALID_CONVERSION"
  | "INVALID_ADDITION"
  | "DIVISION_GUARD"
  | "INVALID_GRADE"
  | "INVALID_BUCKET"
  | "BUCKET_LIMIT"
  | "INVALID_TARGET";

export class CgpaError extends Error {
  readonly code: CgpaErrorCode;

  constructor(code: CgpaErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class HeaderNotFoundError extends CgpaError {
  readonly scannedRows: number;

  constructor(scannedRows: number) {
    super("HEADER_NOT_FOUND", `No header row with "Course Code" and "Grade" found in ${scannedRows} row(s).`);
    this.scannedRows = scannedRows;
  }
}

export type ConversionFailureReason = "unknown_grade" | "non_positive_credits" | "insufficient_credits";

export class InvalidConversionError extends CgpaError {
  readonly operationIndex: number;
  readonly operation: GradeConversion;
  readonly reason: ConversionFailureReason;

  constructor(operationIndex: number, operation: GradeConversion, reason: ConversionFailureReason, detail: string) {
    super("INVALID_CONVERSION", `Conversion #${operationIndex + 1} (${operation.from} -> ${operation.to}, ${operation.credits}): ${detail}`);
    this.operationIndex = operationIndex;
    this.operation = operation;
    this.reason = reason;
  }
}

export type AdditionFailureReason = "unknown_grade" | "non_positive_credits";

export class InvalidAdditionError extends CgpaError {
  readonly operationIndex: number;
  readonly operation: FutureCourseAddition;
  readonly reason: AdditionFailureReason;

  constructor(operationIndex: number, operation: FutureCourseAddition, reason: AdditionFailureReason, detail: string) {
    super("INVALID_ADDITION", `Addition #${operationIndex + 1} (${operation.grade}, ${operation.credits}): ${detail}`);
    this.operationIndex = operationIndex;
    this.operation = operation;
    this.reason = reason;
  }
}

export class DivisionGuardError extends CgpaError {
  constructor(context: string) {
    super("DIVISION_GUARD", `Total credits must be greater than zero (${context}).`);
  }
}

export class InvalidGradeError extends CgpaError {
  readonly grade: string;

  constructor(grade: string, context?: string) {
    super("INVALID_GRADE", context ? `Unrecognized grade "${grade}" in ${context}.` : `Unrecognized grade "${grade}".`);
    this.grade = grade;
  }
}

export class InvalidBucketError extends CgpaError {
  readonly bucketIndex: number;

  constructor(bucketIndex: number, credits: number) {
    super("INVALID_BUCKET", `Bucket #${bucketIndex + 1} must carry a positive credit weight (got ${credits}).`);
    this.bucketIndex = bucketIndex;
  }
}

export class BucketLimitError extends CgpaError {
  readonly bucketCount: number;
  readonly maxBuckets: number;

  constructor(bucketCount: number, maxBuckets: number) {
    super(
      "BUCKET_LIMIT",
      `${bucketCount} buckets means 7^${bucketCount} combinations; the limit is ${maxBuckets}. Raise maxBuckets to search anyway.`
    );
    this.bucketCount = bucketCount;
    this.maxBuckets = maxBuckets;
  }
}

export class InvalidTargetError extends CgpaError {
  constructor(target: number) {
    super("INVALID_TARGET", `Target CGPA must be a finite number (got ${target}).`);
  }
}

export function isCgpaError(error: unknown): error is CgpaError {
  return error instanceof CgpaError;
}

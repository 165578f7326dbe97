import { readFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";

import {
  handleFutureRequest,
  handleImprovementRequest,
  handleNormalizeRequest,
  handlePlanRequest,
  handlePredictRequest
} from "@/lib/api/handlers";

describe("request handlers", () => {
  const fixturePath = path.join(process.cwd(), "tests/fixtures/transcript-dated.json");
  const rows: string[][] = JSON.parse(readFileSync(fixturePath, "utf8"));

  it("normalizes a transcript payload into records, summary and history", () => {
    const response = handleNormalizeRequest({ rows });

    expect(response.status).toBe(200);
    if (response.status !== 200) {
      return;
    }
    expect(response.body.records[0]).toEqual({
      courseCode: "CSE2001",
      title: "Computer Architecture",
      credits: 4,
      grade: "A",
      recordedDate: "2023-01-20"
    });
    expect(response.body.summary.totalCourses).toBe(5);
    expect(response.body.summary.cgpa).toBe(134 / 15);
    expect(response.body.history).toHaveLength(4);
    expect(response.body.dateColumn).toBe("Result Declared On");
    expect(response.body.droppedRows).toHaveLength(7);
  });

  it("answers 422 when the table has no header", () => {
    const response = handleNormalizeRequest({ rows: [["Code", "Grade"]] });

    expect(response).toEqual({
      status: 422,
      body: {
        error: "Failed to normalize the transcript.",
        code: "HEADER_NOT_FOUND",
        details: 'No header row with "Course Code" and "Grade" found in 1 row(s).'
      }
    });
  });

  it("answers 400 with zod issues for a malformed payload", () => {
    const response = handleNormalizeRequest({ rows: "not-a-table" });

    expect(response.status).toBe(400);
    if (response.status === 200) {
      return;
    }
    expect(response.body.error).toBe("Invalid transcript payload.");
    expect(response.body.issues?.[0]?.path).toEqual(["rows"]);
  });

  it("simulates an improvement and reports both CGPAs", () => {
    const response = handleImprovementRequest({
      distribution: { A: 10, B: 6 },
      operations: [{ from: "b", to: " a ", credits: 4 }]
    });

    expect(response).toEqual({
      status: 200,
      body: { distribution: { A: 14, B: 2 }, originalCgpa: 8.625, projectedCgpa: 8.875 }
    });
  });

  it("rejects an over-conversion atomically", () => {
    const response = handleImprovementRequest({
      distribution: { A: 10, B: 6 },
      operations: [{ from: "B", to: "A", credits: 8 }]
    });

    expect(response.status).toBe(422);
    expect(response.body).toMatchObject({ code: "INVALID_CONVERSION" });
  });

  it("rejects non-positive future credits", () => {
    const response = handleFutureRequest({
      distribution: { A: 10 },
      additions: [{ grade: "S", credits: -3 }]
    });

    expect(response.status).toBe(422);
    expect(response.body).toMatchObject({ code: "INVALID_ADDITION" });
  });

  it("adds future courses", () => {
    const response = handleFutureRequest({
      distribution: { A: 10 },
      additions: [{ grade: "S", credits: 5 }]
    });

    expect(response).toEqual({
      status: 200,
      body: { distribution: { S: 5, A: 10 }, originalCgpa: 9, projectedCgpa: 140 / 15 }
    });
  });

  it("plans a target and validates the payload", () => {
    const ok = handlePlanRequest({
      targetCgpa: 9.5,
      currentTotalCredits: 20,
      currentTotalPoints: 180,
      buckets: [{ label: "Capstone", credits: 4 }]
    });
    const invalid = handlePlanRequest({ targetCgpa: 11, currentTotalCredits: 20, currentTotalPoints: 180, buckets: [] });

    expect(ok.status).toBe(200);
    expect(ok.body).toMatchObject({ requiredAverage: 12, assignments: [], feasible: false });
    expect(invalid.status).toBe(400);
  });

  it("refuses bucket limits beyond what the planner can hold in memory", () => {
    const response = handlePlanRequest({
      targetCgpa: 0,
      currentTotalCredits: 0,
      currentTotalPoints: 0,
      buckets: Array.from({ length: 10 }, () => ({ credits: 1 })),
      maxBuckets: 10
    });

    expect(response.status).toBe(400);
    if (response.status === 200) {
      return;
    }
    expect(response.body.issues?.[0]?.path).toEqual(["maxBuckets"]);
  });

  it("projects predicted grades", () => {
    const response = handlePredictRequest({
      currentTotalCredits: 10,
      currentTotalPoints: 80,
      courses: [{ label: "Compilers", credits: 5, grade: "s" }]
    });

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ futurePoints: 50, projectedCgpa: 130 / 15 });
  });
});

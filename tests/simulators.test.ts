import { describe, expect, it } from "vitest";

import { InvalidAdditionError, InvalidConversionError } from "@/lib/errors";
import { cgpaFromDistribution, totalDistributionCredits } from "@/lib/domain/grade-ledger";
import { simulateFuture } from "@/lib/domain/future-course-simulator";
import { simulateImprovement } from "@/lib/domain/improvement-simulator";
import type { Distribution } from "@/types/grades";

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

describe("improvement simulator", () => {
  it("moves credits from one grade to another", () => {
    const original: Distribution = { A: 10, B: 6 };
    const improved = simulateImprovement(original, [{ from: "B", to: "A", credits: 4 }]);

    expect(improved).toEqual({ A: 14, B: 2 });
    expect(cgpaFromDistribution(improved)).toBe(8.875);
    expect(original).toEqual({ A: 10, B: 6 });
  });

  it("checks each conversion against the state left by the previous ones", () => {
    const improved = simulateImprovement({ C: 6, B: 3 }, [
      { from: "C", to: "B", credits: 6 },
      { from: "B", to: "S", credits: 9 }
    ]);

    expect(improved).toEqual({ S: 9 });
  });

  it("conserves total credits", () => {
    const original: Distribution = { S: 4, A: 7.5, D: 3, F: 2, P: 2 };
    const improved = simulateImprovement(original, [
      { from: "F", to: "C", credits: 2 },
      { from: "A", to: "S", credits: 2.5 },
      { from: "D", to: "B", credits: 1 }
    ]);

    expect(totalDistributionCredits(improved)).toBe(totalDistributionCredits(original));
    expect(improved).toEqual({ S: 6.5, A: 5, B: 1, C: 2, D: 2, P: 2 });
  });

  it("rejects converting more credits than the grade holds and leaves the input alone", () => {
    const original: Distribution = { A: 10, B: 6 };
    const error = captureError(() => simulateImprovement(original, [{ from: "B", to: "A", credits: 8 }]));

    expect(error).toBeInstanceOf(InvalidConversionError);
    expect(error).toMatchObject({ operationIndex: 0, reason: "insufficient_credits" });
    expect(original).toEqual({ A: 10, B: 6 });
  });

  it("fails the whole batch when a later conversion is invalid", () => {
    const original: Distribution = { B: 6 };
    const error = captureError(() =>
      simulateImprovement(original, [
        { from: "B", to: "A", credits: 4 },
        { from: "B", to: "S", credits: 3 }
      ])
    );

    expect(error).toMatchObject({
      operationIndex: 1,
      reason: "insufficient_credits",
      message: "Conversion #2 (B -> S, 3): only 2 credit(s) available in grade B."
    });
    expect(original).toEqual({ B: 6 });
  });

  it("rejects unknown grades, P and non-positive amounts", () => {
    expect(() => simulateImprovement({ B: 6 }, [{ from: "B", to: "Z", credits: 1 }])).toThrow(InvalidConversionError);
    expect(() => simulateImprovement({ P: 4 }, [{ from: "P", to: "S", credits: 1 }])).toThrow(InvalidConversionError);
    expect(captureError(() => simulateImprovement({ B: 6 }, [{ from: "B", to: "A", credits: 0 }]))).toMatchObject({
      reason: "non_positive_credits"
    });
    expect(captureError(() => simulateImprovement({ B: 6 }, [{ from: "B", to: "A", credits: Number.NaN }]))).toMatchObject({
      reason: "non_positive_credits"
    });
  });

  it("chains fractional conversions down to an empty grade", () => {
    const tenth = { from: "B", to: "A", credits: 0.1 };
    const improved = simulateImprovement({ B: 0.3 }, [tenth, tenth, tenth]);

    expect(improved).toEqual({ A: 0.1 + 0.1 + 0.1 });
    expect(() => simulateImprovement({ B: 0.3 }, [tenth, tenth, tenth, tenth])).toThrow(InvalidConversionError);
  });

  it("returns a copy for an empty batch", () => {
    const original: Distribution = { A: 3 };
    const result = simulateImprovement(original, []);

    expect(result).toEqual({ A: 3 });
    expect(result).not.toBe(original);
  });
});

describe("future course simulator", () => {
  it("adds projected credits and grows the total", () => {
    const current: Distribution = { A: 14, B: 2 };
    const projected = simulateFuture(current, [
      { grade: "S", credits: 4 },
      { grade: "A", credits: 3 }
    ]);

    expect(projected).toEqual({ S: 4, A: 17, B: 2 });
    expect(totalDistributionCredits(projected)).toBeGreaterThan(totalDistributionCredits(current));
    // (4*10 + 17*9 + 2*8) / 23
    expect(cgpaFromDistribution(projected)).toBe(209 / 23);
    expect(current).toEqual({ A: 14, B: 2 });
  });

  it("rejects zero and negative credit amounts", () => {
    const zero = captureError(() => simulateFuture({ A: 4 }, [{ grade: "A", credits: 0 }]));
    const negative = captureError(() =>
      simulateFuture({ A: 4 }, [
        { grade: "S", credits: 3 },
        { grade: "B", credits: -2 }
      ])
    );

    expect(zero).toBeInstanceOf(InvalidAdditionError);
    expect(zero).toMatchObject({ operationIndex: 0, reason: "non_positive_credits" });
    expect(negative).toMatchObject({ operationIndex: 1, reason: "non_positive_credits" });
  });

  it("rejects grades without a point value", () => {
    expect(captureError(() => simulateFuture({}, [{ grade: "P", credits: 2 }]))).toMatchObject({ reason: "unknown_grade" });
    expect(() => simulateFuture({}, [{ grade: "X", credits: 2 }])).toThrow(InvalidAdditionError);
  });
});

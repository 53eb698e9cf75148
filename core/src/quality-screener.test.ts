import { describe, expect, it } from "vitest";

import { DEFAULT_QUALITY_CONFIG } from "./constants.js";
import { ConfigurationError, InvalidInputError } from "./errors.js";
import {
  checkConsistency,
  checkLongstring,
  checkResponseTime,
  createQualityScreener,
  recommendationFor,
  resolveQualityConfig,
} from "./quality-screener.js";

const repeat = (pattern: readonly number[], times: number): number[] =>
  Array.from({ length: times }, () => pattern).flat();

// Consecutive levels always differ, so the longest run is 2.
const PAIR_LEVELS = [1, 2, 3, 4, 3, 2, 1, 2, 3, 4, 3, 2, 1, 2, 3, 4, 3, 2, 1, 2, 3, 4, 3, 2, 1];

/** Each level answered twice in a row: even and odd halves are identical. */
const attentiveResponses = (): number[] => PAIR_LEVELS.flatMap((level) => [level, level]);

const steadyTimes = (seconds = 4.0): number[] => new Array<number>(50).fill(seconds);

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
};

describe("createQualityScreener", () => {
  const screener = createQualityScreener();

  it("passes an attentive respondent with a perfect score", () => {
    const result = screener.analyze(attentiveResponses(), steadyTimes());

    expect(result.flags).toEqual([]);
    expect(result.qualityScore).toBe(1);
    expect(result.recommendation).toBe("excellent");
    expect(result.isCareless).toBe(false);
    expect(result.details.consistency).toMatchObject({ evaluated: true, correlation: 1 });
    expect(result.details.longstring.maxStreak).toBe(2);
    expect(result.details.mahalanobis).toBeUndefined();
    expect(Number.isNaN(Date.parse(result.timestamp))).toBe(false);
  });

  it("treats alternating midpoint answers as inconsistent and low-variance", () => {
    const result = screener.analyze(repeat([2, 3], 25), steadyTimes(3.5));

    expect(result.flags).toEqual(["inconsistent", "low_variance"]);
    expect(result.isCareless).toBe(true);
    expect(result.qualityScore).toBeCloseTo(0.55, 10);
    expect(result.recommendation).toBe("warning");
    expect(result.details.variance).toEqual({ variance: 0.25, threshold: 0.3, isFlagged: true });
    expect(result.details.consistency).toMatchObject({
      evaluated: true,
      correlation: 0,
      correlationDefined: false,
      evenMean: 2,
      oddMean: 3,
    });
  });

  it("rejects a straight-lined respondent with the documented penalties", () => {
    const result = screener.analyze(new Array<number>(50).fill(2), steadyTimes(3.5));

    expect(result.flags).toEqual(["longstring", "inconsistent", "low_variance"]);
    expect(result.isCareless).toBe(true);
    // 1 - 0.25 (longstring, 50/20 capped) - 0.25 (correlation 0 vs 0.3) - 0.20 (variance)
    expect(result.qualityScore).toBeCloseTo(0.3, 10);
    expect(result.recommendation).toBe("reject");
    expect(result.details.longstring).toEqual({
      maxStreak: 50,
      threshold: 10,
      longStreaks: [{ value: 2, length: 50, startIndex: 0 }],
      isFlagged: true,
    });
  });

  it("scores a speeder with only the response-time penalties", () => {
    const result = screener.analyze(attentiveResponses(), steadyTimes(0.5));

    expect(result.flags).toEqual(["speeding"]);
    // 1 - 0.3 * (2.0 - 0.5) / 2.0 - 0.1 * 1.0
    expect(result.qualityScore).toBeCloseTo(0.675, 10);
    expect(result.recommendation).toBe("acceptable");
  });

  it("flags a speeder and never rates them excellent", () => {
    const responses = [
      3, 1, 4, 1, 2, 4, 2, 3, 1, 3, 2, 4, 4, 1, 3, 2, 1, 4, 3, 2, 2, 1, 3, 4, 1, 2, 4, 3, 1, 1, 4,
      2, 3, 3, 1, 4, 2, 1, 3, 4, 2, 3, 1, 4, 4, 2, 1, 3, 2, 4,
    ];
    const result = screener.analyze(responses, steadyTimes(0.5));

    expect(result.flags).toEqual(["speeding", "inconsistent"]);
    expect(result.recommendation).toBe("reject");
    // speeding 0.225 + 0.1, consistency 0.25 * (0.3 + 0.339) / 0.3
    expect(result.qualityScore).toBeCloseTo(0.1425, 10);
    expect(result.details.consistency).toMatchObject({ correlation: -0.339 });
    expect(result.details.responseTime).toEqual({
      avgTime: 0.5,
      minTime: 0.5,
      maxTime: 0.5,
      maxConsecutiveFast: 50,
      fastCount: 50,
      fastRatio: 1,
      threshold: 2,
      isFlagged: true,
    });
  });

  it("penalizes a slow-but-short mean time without any fast answers", () => {
    const result = screener.analyze(attentiveResponses(), steadyTimes(1.0));

    expect(result.flags).toEqual(["speeding"]);
    expect(result.isCareless).toBe(false);
    // 0.3 * (2.0 - 1.0) / 2.0
    expect(result.qualityScore).toBeCloseTo(0.85, 10);
    expect(result.recommendation).toBe("excellent");
  });

  it("adds the fast-ratio penalty once the share of fast answers exceeds 0.3", () => {
    const times = repeat([0.5, 1.5], 25);
    const result = screener.analyze(attentiveResponses(), times);

    expect(result.details.responseTime.fastRatio).toBe(0.5);
    expect(result.details.responseTime.maxConsecutiveFast).toBe(1);
    // 1 - 0.3 * (2.0 - 1.0) / 2.0 - 0.1 * 0.5
    expect(result.qualityScore).toBeCloseTo(0.8, 10);
  });

  it("keeps the score in [0, 1] and derives isCareless and recommendation for many inputs", () => {
    let seed = 7;
    const next = (): number => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed / 2147483648;
    };

    for (let sample = 0; sample < 40; sample += 1) {
      const responses = Array.from({ length: 50 }, () => 1 + Math.floor(next() * 4));
      const times = Array.from({ length: 50 }, () => next() * 6);
      const result = screener.analyze(responses, times);

      expect(result.qualityScore).toBeGreaterThanOrEqual(0);
      expect(result.qualityScore).toBeLessThanOrEqual(1);
      expect(result.isCareless).toBe(result.flags.length >= 2);
      expect(result.recommendation).toBe(recommendationFor(result.qualityScore));
    }
  });

  it("does not evaluate consistency on a short instrument", () => {
    const shortScreener = createQualityScreener({ itemCount: 10 });
    const result = shortScreener.analyze(
      [1, 2, 3, 4, 1, 2, 3, 4, 1, 2],
      new Array<number>(10).fill(4)
    );

    expect(result.details.consistency).toEqual({
      evaluated: false,
      reason: "Too few responses for consistency check (10 < 20)",
      isFlagged: false,
    });
    expect(result.flags).toEqual([]);
    expect(result.qualityScore).toBe(1);
  });
});

describe("statistical outlier check", () => {
  const twoItem = createQualityScreener({ itemCount: 2, mahalanobisPThreshold: 0.01 });
  const cluster = [
    [2, 2],
    [2, 3],
    [3, 2],
    [3, 3],
  ];

  it("flags a respondent far from the reference cluster", () => {
    const result = twoItem.analyze([1, 4], [3, 3], cluster);

    expect(result.flags).toEqual(["statistical_outlier"]);
    expect(result.details.mahalanobis).toMatchObject({
      evaluated: true,
      distanceSquared: 13.5,
      inverse: "exact",
      isFlagged: true,
    });
    // p = exp(-6.75) < 0.01
    expect(result.qualityScore).toBeCloseTo(0.8, 10);
  });

  it("accepts a respondent within the chi-squared cutoff", () => {
    const result = twoItem.analyze([2, 4], [3, 3], cluster);

    expect(result.flags).toEqual([]);
    expect(result.details.mahalanobis?.isFlagged).toBe(false);
    expect(result.qualityScore).toBe(1);
  });

  it("reports degenerate reference data without failing the other checks", () => {
    const result = twoItem.analyze([1, 4], [0.2, 0.3], [[2, 2]]);

    expect(result.details.mahalanobis).toEqual({
      evaluated: false,
      reason: "reference data needs at least 2 respondents, received 1",
      isFlagged: false,
    });
    expect(result.flags).toEqual(["speeding"]);
  });

  it("rejects reference rows of the wrong width", () => {
    const error = captureError(() => twoItem.analyze([1, 4], [3, 3], [[1, 2, 3]]));

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toMatchObject({ code: "INVALID_INPUT", constraint: "referenceData.shape" });
  });
});

describe("checkLongstring", () => {
  const config = resolveQualityConfig();

  it("does not fire on a run one short of the threshold", () => {
    const responses = [...new Array<number>(9).fill(1), ...repeat([2, 3, 4], 14).slice(0, 41)];
    const details = checkLongstring(responses, config);

    expect(details.maxStreak).toBe(9);
    expect(details.isFlagged).toBe(false);
    expect(details.longStreaks).toEqual([{ value: 1, length: 9, startIndex: 0 }]);
  });

  it("closes and flags a trailing run", () => {
    const responses = [...repeat([2, 3], 20), ...new Array<number>(10).fill(4)];
    const details = checkLongstring(responses, config);

    expect(details.maxStreak).toBe(10);
    expect(details.isFlagged).toBe(true);
    expect(details.longStreaks).toEqual([{ value: 4, length: 10, startIndex: 40 }]);
  });

  it("records every run of five or more", () => {
    const responses = [1, 1, 1, 1, 1, 2, 3, 3, 3, 3, 3, 3, 4];
    const details = checkLongstring(responses, config);

    expect(details.longStreaks).toEqual([
      { value: 1, length: 5, startIndex: 0 },
      { value: 3, length: 6, startIndex: 6 },
    ]);
    expect(details.maxStreak).toBe(6);
  });
});

describe("checkConsistency", () => {
  it("returns a diagnostic instead of throwing below twenty items", () => {
    const responses = [1, 2, 3, 4, 1, 2, 3, 4, 1, 2, 3, 4, 1, 2, 3, 4, 1, 2, 3];
    const details = checkConsistency(responses, DEFAULT_QUALITY_CONFIG);

    expect(details.isFlagged).toBe(false);
    expect(details.evaluated).toBe(false);
  });

  it("truncates halves to equal length for odd counts", () => {
    const responses = [...attentiveResponses().slice(0, 20), 4];
    const details = checkConsistency(responses, DEFAULT_QUALITY_CONFIG);

    expect(details).toMatchObject({ evaluated: true, evenItemsCount: 10, oddItemsCount: 10 });
  });
});

describe("checkResponseTime", () => {
  it("fires on three consecutive fast answers even with a healthy mean", () => {
    const times = [5, 5, 0.4, 0.5, 0.6, 5, 5, 5, 5, 5];
    const details = checkResponseTime(times, DEFAULT_QUALITY_CONFIG);

    expect(details.maxConsecutiveFast).toBe(3);
    expect(details.fastCount).toBe(3);
    expect(details.avgTime).toBe(3.65);
    expect(details.isFlagged).toBe(true);
  });
});

describe("recommendationFor", () => {
  it("maps scores to recommendations with inclusive lower bounds", () => {
    expect(recommendationFor(1)).toBe("excellent");
    expect(recommendationFor(0.81)).toBe("excellent");
    expect(recommendationFor(0.8)).toBe("excellent");
    expect(recommendationFor(0.79)).toBe("acceptable");
    expect(recommendationFor(0.6)).toBe("acceptable");
    expect(recommendationFor(0.59)).toBe("warning");
    expect(recommendationFor(0.4)).toBe("warning");
    expect(recommendationFor(0.39)).toBe("reject");
    expect(recommendationFor(0)).toBe("reject");
  });
});

describe("input validation", () => {
  const screener = createQualityScreener();

  it("rejects a vector of the wrong length", () => {
    const error = captureError(() =>
      screener.analyze(attentiveResponses().slice(1), steadyTimes().slice(1))
    );

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toMatchObject({ constraint: "responses.length" });
  });

  it("rejects out-of-range and non-integer answers", () => {
    const outOfRange = attentiveResponses();
    outOfRange[7] = 5;
    const fractional = attentiveResponses();
    fractional[3] = 2.5;

    expect(captureError(() => screener.analyze(outOfRange, steadyTimes()))).toMatchObject({
      constraint: "responses.range",
    });
    expect(captureError(() => screener.analyze(fractional, steadyTimes()))).toMatchObject({
      constraint: "responses.range",
    });
  });

  it("rejects misaligned or negative timings", () => {
    const negative = steadyTimes();
    negative[0] = -1;

    expect(
      captureError(() => screener.analyze(attentiveResponses(), steadyTimes().slice(2)))
    ).toMatchObject({ constraint: "responseTimes.length" });
    expect(captureError(() => screener.analyze(attentiveResponses(), negative))).toMatchObject({
      constraint: "responseTimes.range",
    });
  });
});

describe("resolveQualityConfig", () => {
  it("applies defaults and overrides", () => {
    expect(resolveQualityConfig({ minTimePerItem: 3 })).toEqual({
      ...DEFAULT_QUALITY_CONFIG,
      minTimePerItem: 3,
    });
  });

  it("fails fast on invalid thresholds", () => {
    const cases = [
      { correlationThreshold: 1.5 },
      { correlationThreshold: 0 },
      { mahalanobisPThreshold: 1 },
      { longstringThreshold: 7.5 },
      { minTimePerItem: 0 },
      { varianceThreshold: -0.1 },
      { itemCount: 0 },
    ];

    for (const overrides of cases) {
      const error = captureError(() => createQualityScreener(overrides));
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        code: "INVALID_CONFIGURATION",
        constraint: Object.keys(overrides)[0],
      });
    }
  });
});

import {
  CONSECUTIVE_FAST_LIMIT,
  CONSISTENCY_PENALTY_MAX,
  CORRELATION_FALLBACK,
  DEFAULT_QUALITY_CONFIG,
  FAST_RATIO_PENALTY_START,
  FAST_RATIO_PENALTY_WEIGHT,
  FAST_RESPONSE_SECONDS,
  LONGSTRING_PENALTY_CAP,
  LONGSTRING_PENALTY_MAX,
  LONGSTRING_REPORT_MIN,
  LOW_VARIANCE_PENALTY,
  MIN_CONSISTENCY_ITEMS,
  OUTLIER_PENALTY,
  OUTLIER_PENALTY_P_VALUE,
  RECOMMENDATION_CUTOFFS,
  TIME_PENALTY_MAX,
} from "./constants.js";
import { ConfigurationError } from "./errors.js";
import { computeMahalanobis } from "./mahalanobis.js";
import { clamp, mean, pearsonCorrelation, populationVariance, roundTo } from "./stats.js";
import type {
  ConsistencyDetails,
  LongstringDetails,
  LongstringRun,
  MahalanobisDetails,
  QualityCheckResult,
  QualityDetails,
  QualityFlag,
  QualityScreenerConfig,
  Recommendation,
  ReferenceMatrix,
  ResponseTimeDetails,
  ResponseVector,
  TimingVector,
  VarianceDetails,
} from "./types.js";
import { validateReferenceData, validateResponses, validateTimings } from "./validation.js";

const requireRange = (
  option: keyof QualityScreenerConfig,
  value: number,
  accept: (value: number) => boolean,
  expectation: string
): void => {
  if (!Number.isFinite(value) || !accept(value)) {
    throw new ConfigurationError(option, `${option} must be ${expectation}, received ${value}`);
  }
};

export const resolveQualityConfig = (
  overrides: Partial<QualityScreenerConfig> = {}
): QualityScreenerConfig => {
  const config: QualityScreenerConfig = { ...DEFAULT_QUALITY_CONFIG, ...overrides };

  requireRange("minTimePerItem", config.minTimePerItem, (v) => v > 0, "greater than 0");
  requireRange(
    "longstringThreshold",
    config.longstringThreshold,
    (v) => Number.isInteger(v) && v >= 2,
    "an integer of at least 2"
  );
  requireRange(
    "correlationThreshold",
    config.correlationThreshold,
    (v) => v > 0 && v <= 1,
    "in (0, 1]"
  );
  requireRange(
    "mahalanobisPThreshold",
    config.mahalanobisPThreshold,
    (v) => v > 0 && v < 1,
    "in (0, 1)"
  );
  requireRange("varianceThreshold", config.varianceThreshold, (v) => v >= 0, "non-negative");
  requireRange(
    "itemCount",
    config.itemCount,
    (v) => Number.isInteger(v) && v >= 1,
    "a positive integer"
  );

  return Object.freeze(config);
};

/** Fires on a low mean latency or a burst of consecutive fast answers. */
export const checkResponseTime = (
  times: TimingVector,
  config: QualityScreenerConfig
): ResponseTimeDetails => {
  const avgTime = mean(times);
  let consecutiveFast = 0;
  let maxConsecutiveFast = 0;
  let fastCount = 0;

  for (const time of times) {
    if (time < FAST_RESPONSE_SECONDS) {
      consecutiveFast += 1;
      fastCount += 1;
      maxConsecutiveFast = Math.max(maxConsecutiveFast, consecutiveFast);
    } else {
      consecutiveFast = 0;
    }
  }

  const isFlagged =
    avgTime < config.minTimePerItem || maxConsecutiveFast >= CONSECUTIVE_FAST_LIMIT;

  return {
    avgTime: roundTo(avgTime, 2),
    minTime: roundTo(Math.min(...times), 2),
    maxTime: roundTo(Math.max(...times), 2),
    maxConsecutiveFast,
    fastCount,
    fastRatio: roundTo(fastCount / times.length, 3),
    threshold: config.minTimePerItem,
    isFlagged,
  };
};

/** Fires when the longest run of identical answers reaches the threshold. */
export const checkLongstring = (
  responses: ResponseVector,
  config: QualityScreenerConfig
): LongstringDetails => {
  const longStreaks: LongstringRun[] = [];
  let maxStreak = 1;
  let currentStreak = 1;

  const closeRun = (endExclusive: number, value: number): void => {
    if (currentStreak >= LONGSTRING_REPORT_MIN) {
      longStreaks.push({ value, length: currentStreak, startIndex: endExclusive - currentStreak });
    }
    maxStreak = Math.max(maxStreak, currentStreak);
  };

  for (let index = 1; index < responses.length; index += 1) {
    if (responses[index] === responses[index - 1]) {
      currentStreak += 1;
    } else {
      closeRun(index, responses[index - 1]);
      currentStreak = 1;
    }
  }
  // the final run never sees a value change
  closeRun(responses.length, responses[responses.length - 1]);

  return {
    maxStreak,
    threshold: config.longstringThreshold,
    longStreaks,
    isFlagged: maxStreak >= config.longstringThreshold,
  };
};

/** Even/odd split-half correlation. Short vectors are reported, not flagged. */
export const checkConsistency = (
  responses: ResponseVector,
  config: QualityScreenerConfig
): ConsistencyDetails => {
  if (responses.length < MIN_CONSISTENCY_ITEMS) {
    return {
      evaluated: false,
      reason: `Too few responses for consistency check (${responses.length} < ${MIN_CONSISTENCY_ITEMS})`,
      isFlagged: false,
    };
  }

  const evenItems = responses.filter((_, index) => index % 2 === 0);
  const oddItems = responses.filter((_, index) => index % 2 === 1);
  const pairedLength = Math.min(evenItems.length, oddItems.length);
  const even = evenItems.slice(0, pairedLength);
  const odd = oddItems.slice(0, pairedLength);

  const measured = pearsonCorrelation(even, odd);
  const correlation = measured ?? CORRELATION_FALLBACK;

  return {
    evaluated: true,
    correlation: roundTo(correlation, 3),
    correlationDefined: measured !== null,
    threshold: config.correlationThreshold,
    evenItemsCount: even.length,
    oddItemsCount: odd.length,
    evenMean: roundTo(mean(even), 2),
    oddMean: roundTo(mean(odd), 2),
    isFlagged: correlation < config.correlationThreshold,
  };
};

/** Best-effort outlier screen against prior respondents; degeneracy is reported, never thrown. */
export const checkMahalanobis = (
  responses: ResponseVector,
  referenceData: ReferenceMatrix,
  config: QualityScreenerConfig
): MahalanobisDetails => {
  const outcome = computeMahalanobis(responses, referenceData, config.mahalanobisPThreshold);

  if (outcome.kind === "degenerate") {
    return { evaluated: false, reason: outcome.reason, isFlagged: false };
  }

  return {
    evaluated: true,
    distance: roundTo(Math.sqrt(outcome.distanceSquared), 3),
    distanceSquared: roundTo(outcome.distanceSquared, 3),
    chi2Threshold: roundTo(outcome.chi2Threshold, 3),
    pValue: roundTo(outcome.pValue, 6),
    inverse: outcome.inverse,
    isFlagged: outcome.distanceSquared > outcome.chi2Threshold,
  };
};

export const checkLowVariance = (
  responses: ResponseVector,
  config: QualityScreenerConfig
): VarianceDetails => {
  const variance = populationVariance(responses);

  return {
    variance: roundTo(variance, 3),
    threshold: config.varianceThreshold,
    isFlagged: variance < config.varianceThreshold,
  };
};

/**
 * Additive penalty model over the reported diagnostics. Each deduction maps
 * to one heuristic; the result is clamped to [0, 1].
 */
export const calculateQualityScore = (
  details: QualityDetails,
  config: QualityScreenerConfig
): number => {
  let score = 1.0;

  const { responseTime, longstring, consistency, mahalanobis, variance } = details;

  if (responseTime.avgTime < config.minTimePerItem) {
    score -=
      (TIME_PENALTY_MAX * (config.minTimePerItem - responseTime.avgTime)) / config.minTimePerItem;
  }
  if (responseTime.fastRatio > FAST_RATIO_PENALTY_START) {
    score -= FAST_RATIO_PENALTY_WEIGHT * responseTime.fastRatio;
  }

  if (longstring.maxStreak >= config.longstringThreshold) {
    score -= LONGSTRING_PENALTY_MAX * Math.min(longstring.maxStreak / LONGSTRING_PENALTY_CAP, 1.0);
  }

  if (consistency.evaluated && consistency.correlation < config.correlationThreshold) {
    score -=
      (CONSISTENCY_PENALTY_MAX * (config.correlationThreshold - consistency.correlation)) /
      config.correlationThreshold;
  }

  if (mahalanobis?.evaluated && mahalanobis.pValue < OUTLIER_PENALTY_P_VALUE) {
    score -= OUTLIER_PENALTY;
  }

  if (variance.isFlagged) {
    score -= LOW_VARIANCE_PENALTY;
  }

  return clamp(score, 0, 1);
};

export const recommendationFor = (qualityScore: number): Recommendation => {
  if (qualityScore >= RECOMMENDATION_CUTOFFS.excellent) {
    return "excellent";
  }
  if (qualityScore >= RECOMMENDATION_CUTOFFS.acceptable) {
    return "acceptable";
  }
  if (qualityScore >= RECOMMENDATION_CUTOFFS.warning) {
    return "warning";
  }
  return "reject";
};

export interface QualityScreener {
  readonly config: QualityScreenerConfig;
  analyze(
    responses: ResponseVector,
    responseTimes: TimingVector,
    referenceData?: ReferenceMatrix
  ): QualityCheckResult;
}

export const createQualityScreener = (
  overrides: Partial<QualityScreenerConfig> = {}
): QualityScreener => {
  const config = resolveQualityConfig(overrides);

  const analyze = (
    responses: ResponseVector,
    responseTimes: TimingVector,
    referenceData?: ReferenceMatrix
  ): QualityCheckResult => {
    validateResponses(responses, config.itemCount);
    validateTimings(responseTimes, responses.length);
    if (referenceData !== undefined) {
      validateReferenceData(referenceData, responses.length);
    }

    const details: QualityDetails = {
      responseTime: checkResponseTime(responseTimes, config),
      longstring: checkLongstring(responses, config),
      consistency: checkConsistency(responses, config),
      ...(referenceData !== undefined
        ? { mahalanobis: checkMahalanobis(responses, referenceData, config) }
        : {}),
      variance: checkLowVariance(responses, config),
    };

    const checks: ReadonlyArray<readonly [QualityFlag, boolean]> = [
      ["speeding", details.responseTime.isFlagged],
      ["longstring", details.longstring.isFlagged],
      ["inconsistent", details.consistency.isFlagged],
      ["statistical_outlier", details.mahalanobis?.isFlagged ?? false],
      ["low_variance", details.variance.isFlagged],
    ];
    const flags = checks.filter(([, fired]) => fired).map(([flag]) => flag);

    const qualityScore = calculateQualityScore(details, config);

    return {
      isCareless: flags.length >= 2,
      flags,
      qualityScore,
      details,
      recommendation: recommendationFor(qualityScore),
      timestamp: new Date().toISOString(),
    };
  };

  return { config, analyze };
};

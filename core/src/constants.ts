import type { QualityScreenerConfig, StyleCorrectorConfig } from "./types.js";

export const LIKERT_MIN = 1;
export const LIKERT_MAX = 4;

/** Sum of a forward answer and its perfectly opposed answer (1+4, 2+3). */
export const REVERSE_SCORE_SUM = LIKERT_MIN + LIKERT_MAX;

export const EXTREME_VALUES: readonly number[] = [LIKERT_MIN, LIKERT_MAX];
export const MIDPOINT_VALUES: readonly number[] = [2, 3];

/** Item count of the reference instrument. */
export const INSTRUMENT_LENGTH = 50;

export const DEFAULT_QUALITY_CONFIG: QualityScreenerConfig = {
  minTimePerItem: 2.0,
  longstringThreshold: 10,
  correlationThreshold: 0.3,
  mahalanobisPThreshold: 0.001,
  varianceThreshold: 0.3,
  itemCount: INSTRUMENT_LENGTH,
} as const;

export const DEFAULT_STYLE_CONFIG: StyleCorrectorConfig = {
  extremeThreshold: 0.7,
  midpointThreshold: 0.7,
  acquiescenceThreshold: 0.7,
} as const;

/** Answers quicker than this (seconds) count as fast. */
export const FAST_RESPONSE_SECONDS = 1.0;
export const CONSECUTIVE_FAST_LIMIT = 3;

/** Runs shorter than this are not listed in the longstring diagnostics. */
export const LONGSTRING_REPORT_MIN = 5;

export const MIN_CONSISTENCY_ITEMS = 20;
export const CORRELATION_FALLBACK = 0.0;

export const TIME_PENALTY_MAX = 0.3;
export const FAST_RATIO_PENALTY_START = 0.3;
export const FAST_RATIO_PENALTY_WEIGHT = 0.1;
export const LONGSTRING_PENALTY_MAX = 0.25;
export const LONGSTRING_PENALTY_CAP = 20;
export const CONSISTENCY_PENALTY_MAX = 0.25;
export const OUTLIER_PENALTY = 0.2;
export const OUTLIER_PENALTY_P_VALUE = 0.01;
export const LOW_VARIANCE_PENALTY = 0.2;

export const RECOMMENDATION_CUTOFFS = {
  excellent: 0.8,
  acceptable: 0.6,
  warning: 0.4,
} as const;

/** Below this standard deviation the extreme-response rescale is skipped. */
export const EXTREME_CORRECTION_MIN_STD = 0.1;
export const EXTREME_CORRECTION_CENTER = 2.5;
export const EXTREME_CORRECTION_SCALE = 0.75;

export const MIDPOINT_NUDGE = 0.5;
export const MIDPOINT_TIE_NUDGE = 0.3;

export const ACQUIESCENCE_TOLERANCE = 1;

/**
 * Reverse-keyed items (0-based) of the Rosenberg-based instrument.
 * Callers inject this through configuration.
 */
export const ROSENBERG_REVERSE_ITEMS: readonly number[] = Object.freeze([
  2, 4, 7, 8, 9, 13, 14, 15, 19, 20, 21,
]);

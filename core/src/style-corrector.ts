import {
  ACQUIESCENCE_TOLERANCE,
  DEFAULT_STYLE_CONFIG,
  EXTREME_CORRECTION_CENTER,
  EXTREME_CORRECTION_MIN_STD,
  EXTREME_CORRECTION_SCALE,
  EXTREME_VALUES,
  LIKERT_MAX,
  LIKERT_MIN,
  MIDPOINT_NUDGE,
  MIDPOINT_TIE_NUDGE,
  MIDPOINT_VALUES,
  REVERSE_SCORE_SUM,
} from "./constants.js";
import { ConfigurationError } from "./errors.js";
import { clamp, mean, populationStd, roundHalfEven, roundTo } from "./stats.js";
import type {
  CorrectionName,
  CorrectionResult,
  ResponseVector,
  ReverseItemSet,
  StyleCorrectorConfig,
} from "./types.js";
import { normalizeReverseItems, validateResponses } from "./validation.js";

export const resolveStyleConfig = (
  overrides: Partial<StyleCorrectorConfig> = {}
): StyleCorrectorConfig => {
  const config: StyleCorrectorConfig = { ...DEFAULT_STYLE_CONFIG, ...overrides };

  for (const [option, value] of Object.entries(config)) {
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
      throw new ConfigurationError(
        option,
        `${option} must be in [0, 1], received ${String(value)}`
      );
    }
  }

  return Object.freeze(config);
};

const toLikert = (value: number): number => {
  return roundHalfEven(clamp(value, LIKERT_MIN, LIKERT_MAX));
};

const shareOf = (responses: ResponseVector, accepted: readonly number[]): number => {
  return responses.filter((value) => accepted.includes(value)).length / responses.length;
};

/** Share of answers at either end of the scale. */
export const extremeRespondingScore = (responses: ResponseVector): number => {
  return shareOf(responses, EXTREME_VALUES);
};

/** Share of answers on the two middle options. */
export const midpointRespondingScore = (responses: ResponseVector): number => {
  return shareOf(responses, MIDPOINT_VALUES);
};

/**
 * Mismatch rate over adjacent item pairs whose polarity differs. A pair
 * matches when its sum is within the tolerance of the reverse-score sum.
 * Only neighbours are compared; reverse items are not paired by content.
 */
export const acquiescenceScore = (
  responses: ResponseVector,
  reverseItems: ReadonlySet<number>
): number => {
  let pairs = 0;
  let mismatches = 0;

  for (let index = 0; index < responses.length - 1; index += 1) {
    if (reverseItems.has(index) === reverseItems.has(index + 1)) {
      continue;
    }
    pairs += 1;
    const sum = responses[index] + responses[index + 1];
    if (Math.abs(sum - REVERSE_SCORE_SUM) > ACQUIESCENCE_TOLERANCE) {
      mismatches += 1;
    }
  }

  return pairs > 0 ? mismatches / pairs : 0;
};

/** Z-scores remapped onto a compressed scale; flat vectors are returned as-is. */
export const correctExtreme = (responses: ResponseVector): number[] => {
  const std = populationStd(responses);
  if (std < EXTREME_CORRECTION_MIN_STD) {
    return [...responses];
  }

  const m = mean(responses);
  return responses.map((value) =>
    toLikert(EXTREME_CORRECTION_CENTER + ((value - m) / std) * EXTREME_CORRECTION_SCALE)
  );
};

/** Pushes midpoint answers away from the vector mean; endpoints pass through. */
export const correctMidpoint = (responses: ResponseVector): number[] => {
  const m = mean(responses);

  return responses.map((value) => {
    if (!MIDPOINT_VALUES.includes(value)) {
      return value;
    }

    let adjustment: number;
    if (value > m) {
      adjustment = MIDPOINT_NUDGE;
    } else if (value < m) {
      adjustment = -MIDPOINT_NUDGE;
    } else {
      adjustment = value === LIKERT_MAX - 1 ? MIDPOINT_TIE_NUDGE : -MIDPOINT_TIE_NUDGE;
    }

    return toLikert(value + adjustment);
  });
};

/** Reverse-scores every listed item (x -> 5 - x on a 1-4 scale). */
export const reverseScore = (
  responses: ResponseVector,
  reverseItems: Iterable<number>
): number[] => {
  const result = [...responses];
  for (const index of reverseItems) {
    result[index] = REVERSE_SCORE_SUM - responses[index];
  }
  return result;
};

export interface StyleCorrector {
  readonly config: StyleCorrectorConfig;
  correct(responses: ResponseVector, reverseItems?: ReverseItemSet): CorrectionResult;
}

export const createStyleCorrector = (
  overrides: Partial<StyleCorrectorConfig> = {}
): StyleCorrector => {
  const config = resolveStyleConfig(overrides);

  const correct = (responses: ResponseVector, reverseItems?: ReverseItemSet): CorrectionResult => {
    validateResponses(responses);
    const reverse = normalizeReverseItems(reverseItems ?? [], responses.length);
    const hasReverseItems = reverse.length > 0;

    // All scores come from the untouched input.
    const ers = extremeRespondingScore(responses);
    const mrs = midpointRespondingScore(responses);
    const aq = hasReverseItems ? acquiescenceScore(responses, new Set(reverse)) : null;

    let corrected = [...responses];
    const correctionsApplied: CorrectionName[] = [];

    if (ers > config.extremeThreshold) {
      corrected = correctExtreme(corrected);
      correctionsApplied.push("extreme_responding");
    }

    if (mrs > config.midpointThreshold) {
      corrected = correctMidpoint(corrected);
      correctionsApplied.push("midpoint_responding");
    }

    if (aq !== null && aq > config.acquiescenceThreshold) {
      corrected = reverseScore(corrected, reverse);
      correctionsApplied.push("acquiescence_bias");
    }

    return {
      correctedResponses: corrected,
      correctionsApplied,
      originalResponses: [...responses],
      styleScores: {
        extremeResponding: roundTo(ers, 3),
        midpointResponding: roundTo(mrs, 3),
        acquiescence: aq === null ? null : roundTo(aq, 3),
      },
      timestamp: new Date().toISOString(),
    };
  };

  return { config, correct };
};

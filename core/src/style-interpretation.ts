import type { StyleInterpretation, StyleInterpretations, StyleScores } from "./types.js";

type Band = StyleInterpretation & { readonly above: number };

// Bands are checked top-down; the first whose cutoff the score exceeds wins.
const EXTREME_BANDS: readonly Band[] = [
  {
    above: 0.8,
    level: "very_high",
    message: "Almost every answer was at an end of the scale (1 or 4).",
    recommendation: "Consider the moderate options as well.",
  },
  {
    above: 0.6,
    level: "high",
    message: "Many answers were at an end of the scale.",
    recommendation: "Try choosing 2 or 3 on some questions.",
  },
];

const MIDPOINT_BANDS: readonly Band[] = [
  {
    above: 0.8,
    level: "very_high",
    message: "Most answers were 2 or 3.",
    recommendation: "Where you feel certain, 1 or 4 is fine to choose.",
  },
  {
    above: 0.6,
    level: "high",
    message: "Many answers were in the middle of the scale.",
    recommendation: "If you hold a clear opinion, choosing an end of the scale is fine.",
  },
];

const ACQUIESCENCE_BANDS: readonly Band[] = [
  {
    above: 0.7,
    level: "high",
    message: "Answers tend to agree regardless of how the question is worded.",
    recommendation: "Read the reverse-worded questions carefully.",
  },
];

const NORMAL = {
  extremeResponding: "Extreme responding is within the normal range.",
  midpointResponding: "Midpoint responding is within the normal range.",
  acquiescence: "Agreement bias is within the normal range.",
} as const;

const interpret = (
  score: number,
  bands: readonly Band[],
  normalMessage: string
): StyleInterpretation => {
  const band = bands.find((candidate) => score > candidate.above);
  if (!band) {
    return { level: "normal", message: normalMessage, recommendation: null };
  }
  return { level: band.level, message: band.message, recommendation: band.recommendation };
};

/** Advisory reading of style scores; acquiescence is omitted when it was not measured. */
export const interpretStyleScores = (scores: StyleScores): StyleInterpretations => {
  const base = {
    extremeResponding: interpret(scores.extremeResponding, EXTREME_BANDS, NORMAL.extremeResponding),
    midpointResponding: interpret(
      scores.midpointResponding,
      MIDPOINT_BANDS,
      NORMAL.midpointResponding
    ),
  };

  if (scores.acquiescence === null) {
    return base;
  }

  return {
    ...base,
    acquiescence: interpret(scores.acquiescence, ACQUIESCENCE_BANDS, NORMAL.acquiescence),
  };
};

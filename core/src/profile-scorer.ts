import { INSTRUMENT_LENGTH, REVERSE_SCORE_SUM } from "./constants.js";
import { InvalidInputError } from "./errors.js";
import { mean, roundTo } from "./stats.js";
import type { EsteemProfile, EsteemType, ResponseVector, TimingVector } from "./types.js";
import { validateResponses } from "./validation.js";

/** 0-based item indices of each sub-scale in the 50-item instrument. */
export const PROFILE_ITEMS = {
  rosenbergPositive: [0, 1, 3, 5, 6],
  rosenbergNegative: [2, 4, 7, 8, 9],
  selfKindness: [10, 11, 12],
  selfJudgment: [13, 14, 15],
  commonHumanity: [16, 17, 18],
  isolation: [19, 20, 21],
  fixedMindset: [22, 23, 24, 25],
  growthMindset: [26, 27, 28, 29],
  dependent: [30, 31, 32, 33, 34],
  independent: [35, 36, 37, 38, 39],
  implicit: [40, 41, 42, 43, 44, 45, 46, 47, 48, 49],
} as const;

export const ROSENBERG_MAX = 40;

const IMPLICIT_TIMING_WINDOW = 10;
const IMPLICIT_TIMING_CEILING = 5.0;
const IMPLICIT_TIMING_FALLBACK = 3.0;

const pick = (responses: ResponseVector, items: readonly number[]): number[] =>
  items.map((index) => responses[index]);

const reversed = (responses: ResponseVector, items: readonly number[]): number[] =>
  pick(responses, items).map((value) => REVERSE_SCORE_SUM - value);

const sum = (values: readonly number[]): number => values.reduce((acc, value) => acc + value, 0);

export const rosenbergScore = (responses: ResponseVector): number => {
  return (
    sum(pick(responses, PROFILE_ITEMS.rosenbergPositive)) +
    sum(reversed(responses, PROFILE_ITEMS.rosenbergNegative))
  );
};

export const selfCompassionScore = (responses: ResponseVector): number => {
  return mean([
    mean(pick(responses, PROFILE_ITEMS.selfKindness)),
    mean(reversed(responses, PROFILE_ITEMS.selfJudgment)),
    mean(pick(responses, PROFILE_ITEMS.commonHumanity)),
    mean(reversed(responses, PROFILE_ITEMS.isolation)),
  ]);
};

export const mindsetScore = (responses: ResponseVector): number => {
  return mean([
    mean(reversed(responses, PROFILE_ITEMS.fixedMindset)),
    mean(pick(responses, PROFILE_ITEMS.growthMindset)),
  ]);
};

export const relationalScore = (responses: ResponseVector): number => {
  return mean([
    mean(reversed(responses, PROFILE_ITEMS.dependent)),
    mean(pick(responses, PROFILE_ITEMS.independent)),
  ]);
};

/** Timing steadiness over the last answers blended with the implicit items. */
export const implicitScore = (responses: ResponseVector, responseTimes?: TimingVector): number => {
  let steadiness = IMPLICIT_TIMING_FALLBACK;
  if (responseTimes && responseTimes.length >= IMPLICIT_TIMING_WINDOW) {
    const window = responseTimes.slice(-IMPLICIT_TIMING_WINDOW);
    steadiness = IMPLICIT_TIMING_CEILING - (Math.max(...window) - Math.min(...window)) / 2;
  }

  return (steadiness + mean(pick(responses, PROFILE_ITEMS.implicit))) / 2;
};

export const classifyEsteemType = (rosenberg: number, selfCompassion: number): EsteemType => {
  if (rosenberg < 20) {
    return selfCompassion < 2.5 ? "vulnerable" : "compassionate_grower";
  }
  if (rosenberg < 30) {
    return selfCompassion < 3.0 ? "developing_critic" : "developing_balanced";
  }
  return selfCompassion >= 3.5 ? "thriving" : "stable_rigid";
};

export const scoreProfile = (
  responses: ResponseVector,
  responseTimes?: TimingVector
): EsteemProfile => {
  validateResponses(responses);
  if (responses.length < INSTRUMENT_LENGTH) {
    throw new InvalidInputError(
      "responses.length",
      `profile scoring needs at least ${INSTRUMENT_LENGTH} items, received ${responses.length}`
    );
  }

  const rosenberg = rosenbergScore(responses);
  const selfCompassion = selfCompassionScore(responses);
  const mindset = mindsetScore(responses);
  const relational = relationalScore(responses);
  const implicit = implicitScore(responses, responseTimes);

  return {
    scores: {
      rosenberg,
      rosenbergMax: ROSENBERG_MAX,
      selfCompassion: roundTo(selfCompassion, 2),
      mindset: roundTo(mindset, 2),
      relational: roundTo(relational, 2),
      implicit: roundTo(implicit, 2),
    },
    esteemType: classifyEsteemType(rosenberg, selfCompassion),
    dimensions: {
      esteemStability: roundTo(rosenberg / 4, 1),
      selfCompassion: roundTo(selfCompassion * 2, 1),
      growthMindset: roundTo(mindset * 2, 1),
      relationalIndependence: roundTo(relational * 2, 1),
      implicitEsteem: roundTo(implicit * 2, 1),
    },
  };
};

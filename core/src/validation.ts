import { LIKERT_MAX, LIKERT_MIN } from "./constants.js";
import { InvalidInputError } from "./errors.js";
import type { ReferenceMatrix, ReverseItemSet } from "./types.js";

export const validateResponses = (responses: readonly number[], expectedLength?: number): void => {
  if (responses.length === 0) {
    throw new InvalidInputError("responses.length", "responses must not be empty");
  }

  if (expectedLength !== undefined && responses.length !== expectedLength) {
    throw new InvalidInputError(
      "responses.length",
      `responses must contain exactly ${expectedLength} items, received ${responses.length}`
    );
  }

  responses.forEach((value, index) => {
    if (!Number.isInteger(value) || value < LIKERT_MIN || value > LIKERT_MAX) {
      throw new InvalidInputError(
        "responses.range",
        `responses[${index}] must be an integer in [${LIKERT_MIN}, ${LIKERT_MAX}], received ${value}`
      );
    }
  });
};

export const validateTimings = (times: readonly number[], expectedLength: number): void => {
  if (times.length !== expectedLength) {
    throw new InvalidInputError(
      "responseTimes.length",
      `responseTimes must align with responses (${expectedLength} items), received ${times.length}`
    );
  }

  times.forEach((value, index) => {
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidInputError(
        "responseTimes.range",
        `responseTimes[${index}] must be a finite non-negative number, received ${value}`
      );
    }
  });
};

/** Returns the indices sorted and de-duplicated. */
export const normalizeReverseItems = (
  reverseItems: ReverseItemSet,
  itemCount: number
): number[] => {
  const unique = new Set<number>();

  for (const index of reverseItems) {
    if (!Number.isInteger(index) || index < 0 || index >= itemCount) {
      throw new InvalidInputError(
        "reverseItems.range",
        `reverse item index ${index} is outside [0, ${itemCount})`
      );
    }
    unique.add(index);
  }

  return [...unique].sort((a, b) => a - b);
};

export const validateReferenceData = (reference: ReferenceMatrix, itemCount: number): void => {
  reference.forEach((row, rowIndex) => {
    if (row.length !== itemCount) {
      throw new InvalidInputError(
        "referenceData.shape",
        `referenceData[${rowIndex}] has ${row.length} items, expected ${itemCount}`
      );
    }

    if (!row.every((value) => Number.isFinite(value))) {
      throw new InvalidInputError(
        "referenceData.values",
        `referenceData[${rowIndex}] contains a non-finite value`
      );
    }
  });
};

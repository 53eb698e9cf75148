import { chiSquaredCriticalValue, chiSquaredSurvival } from "./chi-squared.js";
import { invertMatrix, pseudoInverseSymmetric, quadraticForm } from "./matrix.js";
import { columnMeans, covarianceMatrix } from "./stats.js";
import type { CovarianceInverse, ReferenceMatrix } from "./types.js";

export type MahalanobisOutcome =
  | {
      readonly kind: "computed";
      readonly distanceSquared: number;
      readonly chi2Threshold: number;
      readonly pValue: number;
      readonly inverse: CovarianceInverse;
    }
  | {
      readonly kind: "degenerate";
      readonly reason: string;
    };

export const MIN_REFERENCE_ROWS = 2;

/**
 * Squared Mahalanobis distance of `vector` from the reference mean, with the
 * chi-squared critical value at `pThreshold` and df = vector length.
 * Falls back to the pseudo-inverse when the covariance is singular.
 */
export const computeMahalanobis = (
  vector: readonly number[],
  reference: ReferenceMatrix,
  pThreshold: number
): MahalanobisOutcome => {
  if (reference.length < MIN_REFERENCE_ROWS) {
    return {
      kind: "degenerate",
      reason: `reference data needs at least ${MIN_REFERENCE_ROWS} respondents, received ${reference.length}`,
    };
  }

  const means = columnMeans(reference);
  const covariance = covarianceMatrix(reference);
  const exact = invertMatrix(covariance);
  const inverse: CovarianceInverse = exact ? "exact" : "pseudo";
  const precision = exact ?? pseudoInverseSymmetric(covariance);

  const diff = vector.map((value, index) => value - (means[index] ?? 0));
  const raw = quadraticForm(diff, precision);

  if (!Number.isFinite(raw)) {
    return { kind: "degenerate", reason: "covariance is ill-conditioned; distance is not finite" };
  }

  // Rounding in the pseudo-inverse can leave a tiny negative form.
  const distanceSquared = Math.max(0, raw);
  const df = vector.length;

  return {
    kind: "computed",
    distanceSquared,
    chi2Threshold: chiSquaredCriticalValue(pThreshold, df),
    pValue: chiSquaredSurvival(distanceSquared, df),
    inverse,
  };
};

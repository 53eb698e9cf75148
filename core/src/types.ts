/** One respondent's answers, each an integer on the Likert scale. */
export type ResponseVector = readonly number[];

/** Per-item answer latency in seconds, index-aligned with the responses. */
export type TimingVector = readonly number[];

/** 0-based indices of reverse-keyed items. */
export type ReverseItemSet = ReadonlySet<number> | readonly number[];

/** Rows are prior respondents, columns are items. */
export type ReferenceMatrix = readonly (readonly number[])[];

export interface QualityScreenerConfig {
  readonly minTimePerItem: number;
  readonly longstringThreshold: number;
  readonly correlationThreshold: number;
  readonly mahalanobisPThreshold: number;
  readonly varianceThreshold: number;
  readonly itemCount: number;
}

export interface StyleCorrectorConfig {
  readonly extremeThreshold: number;
  readonly midpointThreshold: number;
  readonly acquiescenceThreshold: number;
}

export type QualityFlag =
  | "speeding"
  | "longstring"
  | "inconsistent"
  | "statistical_outlier"
  | "low_variance";

export type Recommendation = "excellent" | "acceptable" | "warning" | "reject";

export interface ResponseTimeDetails {
  readonly avgTime: number;
  readonly minTime: number;
  readonly maxTime: number;
  readonly maxConsecutiveFast: number;
  readonly fastCount: number;
  readonly fastRatio: number;
  readonly threshold: number;
  readonly isFlagged: boolean;
}

export interface LongstringRun {
  readonly value: number;
  readonly length: number;
  readonly startIndex: number;
}

export interface LongstringDetails {
  readonly maxStreak: number;
  readonly threshold: number;
  readonly longStreaks: readonly LongstringRun[];
  readonly isFlagged: boolean;
}

export type ConsistencyDetails =
  | {
      readonly evaluated: true;
      readonly correlation: number;
      /** False when either half had zero variance and the fallback was used. */
      readonly correlationDefined: boolean;
      readonly threshold: number;
      readonly evenItemsCount: number;
      readonly oddItemsCount: number;
      readonly evenMean: number;
      readonly oddMean: number;
      readonly isFlagged: boolean;
    }
  | {
      readonly evaluated: false;
      readonly reason: string;
      readonly isFlagged: false;
    };

export type MahalanobisDetails =
  | {
      readonly evaluated: true;
      readonly distance: number;
      readonly distanceSquared: number;
      readonly chi2Threshold: number;
      readonly pValue: number;
      readonly inverse: CovarianceInverse;
      readonly isFlagged: boolean;
    }
  | {
      readonly evaluated: false;
      readonly reason: string;
      readonly isFlagged: false;
    };

export type CovarianceInverse = "exact" | "pseudo";

export interface VarianceDetails {
  readonly variance: number;
  readonly threshold: number;
  readonly isFlagged: boolean;
}

export interface QualityDetails {
  readonly responseTime: ResponseTimeDetails;
  readonly longstring: LongstringDetails;
  readonly consistency: ConsistencyDetails;
  /** Present only when reference data was supplied. */
  readonly mahalanobis?: MahalanobisDetails;
  readonly variance: VarianceDetails;
}

export interface QualityCheckResult {
  readonly isCareless: boolean;
  readonly flags: readonly QualityFlag[];
  readonly qualityScore: number;
  readonly details: QualityDetails;
  readonly recommendation: Recommendation;
  readonly timestamp: string;
}

export type CorrectionName = "extreme_responding" | "midpoint_responding" | "acquiescence_bias";

export interface StyleScores {
  readonly extremeResponding: number;
  readonly midpointResponding: number;
  /** Null when no reverse items were supplied. */
  readonly acquiescence: number | null;
}

export interface CorrectionResult {
  readonly correctedResponses: number[];
  readonly correctionsApplied: readonly CorrectionName[];
  readonly originalResponses: number[];
  readonly styleScores: StyleScores;
  readonly timestamp: string;
}

export type StyleLevel = "normal" | "high" | "very_high";

export interface StyleInterpretation {
  readonly level: StyleLevel;
  readonly message: string;
  readonly recommendation: string | null;
}

export interface StyleInterpretations {
  readonly extremeResponding: StyleInterpretation;
  readonly midpointResponding: StyleInterpretation;
  readonly acquiescence?: StyleInterpretation;
}

export type EsteemType =
  | "vulnerable"
  | "compassionate_grower"
  | "developing_critic"
  | "developing_balanced"
  | "stable_rigid"
  | "thriving";

export interface ProfileScores {
  readonly rosenberg: number;
  readonly rosenbergMax: number;
  readonly selfCompassion: number;
  readonly mindset: number;
  readonly relational: number;
  readonly implicit: number;
}

/** Each dimension on a 0-10 scale. */
export interface ProfileDimensions {
  readonly esteemStability: number;
  readonly selfCompassion: number;
  readonly growthMindset: number;
  readonly relationalIndependence: number;
  readonly implicitEsteem: number;
}

export interface EsteemProfile {
  readonly scores: ProfileScores;
  readonly esteemType: EsteemType;
  readonly dimensions: ProfileDimensions;
}

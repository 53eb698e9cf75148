export type {
  ConsistencyDetails,
  CorrectionName,
  CorrectionResult,
  CovarianceInverse,
  EsteemProfile,
  EsteemType,
  LongstringDetails,
  LongstringRun,
  MahalanobisDetails,
  ProfileDimensions,
  ProfileScores,
  QualityCheckResult,
  QualityDetails,
  QualityFlag,
  QualityScreenerConfig,
  Recommendation,
  ReferenceMatrix,
  ResponseTimeDetails,
  ResponseVector,
  ReverseItemSet,
  StyleCorrectorConfig,
  StyleInterpretation,
  StyleInterpretations,
  StyleLevel,
  StyleScores,
  TimingVector,
  VarianceDetails,
} from "./types.js";

export {
  DEFAULT_QUALITY_CONFIG,
  DEFAULT_STYLE_CONFIG,
  INSTRUMENT_LENGTH,
  LIKERT_MAX,
  LIKERT_MIN,
  REVERSE_SCORE_SUM,
  ROSENBERG_REVERSE_ITEMS,
} from "./constants.js";

export {
  ConfigurationError,
  InvalidInputError,
  ResponseQualityError,
  isResponseQualityError,
  type ResponseQualityErrorCode,
} from "./errors.js";

export {
  createQualityScreener,
  recommendationFor,
  resolveQualityConfig,
  type QualityScreener,
} from "./quality-screener.js";

export {
  createStyleCorrector,
  resolveStyleConfig,
  reverseScore,
  type StyleCorrector,
} from "./style-corrector.js";

export { interpretStyleScores } from "./style-interpretation.js";

export { scoreProfile } from "./profile-scorer.js";

export { computeMahalanobis, type MahalanobisOutcome } from "./mahalanobis.js";

export { normalizeReverseItems } from "./validation.js";

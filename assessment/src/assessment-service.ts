import {
  INSTRUMENT_LENGTH,
  InvalidInputError,
  createQualityScreener,
  createStyleCorrector,
  interpretStyleScores,
  isResponseQualityError,
  scoreProfile,
  type CorrectionName,
  type EsteemProfile,
  type QualityCheckResult,
  type QualityDetails,
  type QualityFlag,
  type QualityScreener,
  type Recommendation,
  type ReferenceMatrix,
  type ResponseVector,
  type ReverseItemSet,
  type StyleCorrector,
  type StyleInterpretations,
  type StyleScores,
  type TimingVector,
} from "@response-quality/core";

import { loadAssessmentConfig, type AssessmentConfig } from "./config.js";
import type { ErrorReporter } from "./error-reporting.js";
import { assignExperimentGroup, type ExperimentGroup } from "./experiment.js";
import { createLogger, type Logger } from "./logger.js";
import {
  CONTROL_MESSAGE,
  SUCCESS_MESSAGE,
  WARNING_MESSAGE,
  buildQualityWarningMessage,
} from "./quality-message.js";

export interface AssessmentRequest {
  userId: string;
  responses: ResponseVector;
  responseTimes: TimingVector;
  /** Falls back to the configured reverse items when omitted. */
  reverseItems?: ReverseItemSet;
  referenceData?: ReferenceMatrix;
}

export type AssessmentStatus = "success" | "warning" | "invalid";

export interface DataQualitySummary {
  qualityScore: number;
  flags: readonly QualityFlag[];
  recommendation: Recommendation;
  isCareless: boolean;
  details: QualityDetails;
}

export interface StyleCorrectionSummary {
  correctionsApplied: readonly CorrectionName[];
  styleScores: StyleScores;
  interpretation: StyleInterpretations;
}

export interface AssessmentResult {
  userId: string;
  status: AssessmentStatus;
  message: string;
  dataQuality: DataQualitySummary;
  correctedResponses: number[];
  styleCorrections: StyleCorrectionSummary | null;
  profile: EsteemProfile | null;
  timestamp: string;
}

export type ExperimentAssessmentResult =
  | (AssessmentResult & { group: "treatment" })
  | {
      group: "control";
      userId: string;
      status: "success";
      message: string;
      dataQuality: null;
      correctedResponses: number[];
      styleCorrections: null;
      profile: null;
      timestamp: string;
    };

export interface AssessmentServiceOptions {
  config?: AssessmentConfig;
  screener?: QualityScreener;
  corrector?: StyleCorrector;
  logger?: Logger;
  reporter?: ErrorReporter;
  assignGroup?: (userId: string) => ExperimentGroup;
  now?: () => Date;
}

export interface AssessmentService {
  assess(request: AssessmentRequest): AssessmentResult;
  assessWithExperiment(request: AssessmentRequest): ExperimentAssessmentResult;
}

const noopReporter: ErrorReporter = {
  enabled: false,
  report: () => undefined,
};

const summarizeQuality = (quality: QualityCheckResult): DataQualitySummary => ({
  qualityScore: quality.qualityScore,
  flags: quality.flags,
  recommendation: quality.recommendation,
  isCareless: quality.isCareless,
  details: quality.details,
});

export const createAssessmentService = (
  options: AssessmentServiceOptions = {}
): AssessmentService => {
  const config = options.config ?? loadAssessmentConfig({});
  const screener = options.screener ?? createQualityScreener(config.quality);
  const corrector = options.corrector ?? createStyleCorrector(config.style);
  const logger =
    options.logger ??
    createLogger({
      production: config.environment === "production",
      debugMode: config.debugMode,
    });
  const reporter = options.reporter ?? noopReporter;
  const assignGroup = options.assignGroup ?? assignExperimentGroup;
  const now = options.now ?? (() => new Date());

  const runAssessment = (request: AssessmentRequest): AssessmentResult => {
    if (request.userId.trim().length === 0) {
      throw new InvalidInputError("userId", "userId must not be empty");
    }

    const quality = screener.analyze(
      request.responses,
      request.responseTimes,
      request.referenceData
    );
    const dataQuality = summarizeQuality(quality);

    if (quality.recommendation === "reject") {
      logger.warn("Assessment rejected", {
        userId: request.userId,
        qualityScore: quality.qualityScore,
        flags: quality.flags,
      });

      return {
        userId: request.userId,
        status: "invalid",
        message: buildQualityWarningMessage(quality.flags),
        dataQuality,
        correctedResponses: [...request.responses],
        styleCorrections: null,
        profile: null,
        timestamp: now().toISOString(),
      };
    }

    const correction = corrector.correct(
      request.responses,
      request.reverseItems ?? config.reverseItems
    );

    // Profiles are defined on the full instrument only.
    const profile =
      correction.correctedResponses.length >= INSTRUMENT_LENGTH
        ? scoreProfile(correction.correctedResponses, request.responseTimes)
        : null;

    const status: AssessmentStatus = quality.recommendation === "warning" ? "warning" : "success";

    logger.info("Assessment completed", {
      userId: request.userId,
      status,
      qualityScore: quality.qualityScore,
      correctionsApplied: correction.correctionsApplied,
    });

    return {
      userId: request.userId,
      status,
      message: status === "warning" ? WARNING_MESSAGE : SUCCESS_MESSAGE,
      dataQuality,
      correctedResponses: correction.correctedResponses,
      styleCorrections: {
        correctionsApplied: correction.correctionsApplied,
        styleScores: correction.styleScores,
        interpretation: interpretStyleScores(correction.styleScores),
      },
      profile,
      timestamp: now().toISOString(),
    };
  };

  const assess = (request: AssessmentRequest): AssessmentResult => {
    try {
      return runAssessment(request);
    } catch (error) {
      if (!isResponseQualityError(error)) {
        logger.error("Assessment failed", { userId: request.userId, error });
        reporter.report(error, { userId: request.userId });
      }
      throw error;
    }
  };

  const assessWithExperiment = (request: AssessmentRequest): ExperimentAssessmentResult => {
    const group = assignGroup(request.userId);

    if (group === "control") {
      logger.info("Experiment assignment", { userId: request.userId, group });

      return {
        group,
        userId: request.userId,
        status: "success",
        message: CONTROL_MESSAGE,
        dataQuality: null,
        correctedResponses: [...request.responses],
        styleCorrections: null,
        profile: null,
        timestamp: now().toISOString(),
      };
    }

    const result = assess(request);

    logger.info("Experiment assignment", {
      userId: request.userId,
      group,
      status: result.status,
      qualityScore: result.dataQuality.qualityScore,
      flags: result.dataQuality.flags,
      correctionsApplied: result.styleCorrections?.correctionsApplied ?? [],
    });

    return { ...result, group };
  };

  return { assess, assessWithExperiment };
};

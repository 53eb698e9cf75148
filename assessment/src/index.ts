import {
  createAssessmentService,
  type AssessmentService,
  type AssessmentServiceOptions,
} from "./assessment-service.js";
import { loadAssessmentConfig, loadProjectEnv, type EnvSource } from "./config.js";
import { createErrorReporter } from "./error-reporting.js";
import { createLogger } from "./logger.js";

export {
  createAssessmentService,
  type AssessmentRequest,
  type AssessmentResult,
  type AssessmentService,
  type AssessmentServiceOptions,
  type AssessmentStatus,
  type DataQualitySummary,
  type ExperimentAssessmentResult,
  type StyleCorrectionSummary,
} from "./assessment-service.js";
export {
  loadAssessmentConfig,
  loadProjectEnv,
  type AssessmentConfig,
  type EnvSource,
} from "./config.js";
export {
  createErrorReporter,
  type ErrorReporter,
  type ErrorReportingOptions,
} from "./error-reporting.js";
export { assignExperimentGroup, type ExperimentGroup } from "./experiment.js";
export {
  createLogger,
  type LogLevel,
  type LogSink,
  type Logger,
  type LoggerOptions,
} from "./logger.js";
export { buildQualityWarningMessage } from "./quality-message.js";

export interface EnvironmentServiceOptions
  extends Pick<AssessmentServiceOptions, "now" | "assignGroup"> {
  cwd?: string;
  env?: EnvSource;
}

/** Wires config, logging and error reporting from the process environment. */
export const createAssessmentServiceFromEnv = (
  options: EnvironmentServiceOptions = {}
): AssessmentService => {
  const env = options.env ?? process.env;
  loadProjectEnv(options.cwd, env);

  const config = loadAssessmentConfig(env);
  const logger = createLogger({
    production: config.environment === "production",
    debugMode: config.debugMode,
  });
  const reporter = createErrorReporter({
    dsn: config.sentryDsn,
    environment: config.environment,
  });

  logger.debug("Assessment service configured", {
    environment: config.environment,
    errorReporting: reporter.enabled,
  });

  return createAssessmentService({
    config,
    logger,
    reporter,
    now: options.now,
    assignGroup: options.assignGroup,
  });
};

import type { QualityFlag } from "@response-quality/core";

const FLAG_MESSAGES: Record<QualityFlag, string> = {
  speeding: "You answered too quickly.",
  longstring: "Too many consecutive answers were identical.",
  inconsistent: "Your answers were not consistent with each other.",
  statistical_outlier: "Your answer pattern is statistically unusual.",
  low_variance: "Your answers hardly varied across the questionnaire.",
};

export const SUCCESS_MESSAGE = "Your assessment was completed successfully.";

export const WARNING_MESSAGE =
  "Your assessment was completed, but there were minor issues with response quality.";

export const CONTROL_MESSAGE = "Assessment recorded without screening.";

/** Rejection text shown to a respondent, one line per raised flag. */
export const buildQualityWarningMessage = (flags: readonly QualityFlag[]): string => {
  return [
    "Your response quality is too low:",
    ...flags.map((flag) => `- ${FLAG_MESSAGES[flag]}`),
    "",
    "Please take the questionnaire again at your own pace for a more accurate result.",
  ].join("\n");
};

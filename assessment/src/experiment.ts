import { createHash } from "node:crypto";

export type ExperimentGroup = "control" | "treatment";

/** Stable split on the last byte of the user id's SHA-256 digest. */
export const assignExperimentGroup = (userId: string): ExperimentGroup => {
  const digest = createHash("sha256").update(userId, "utf8").digest();
  return digest[digest.length - 1] % 2 === 0 ? "treatment" : "control";
};

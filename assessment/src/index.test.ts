import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import * as Sentry from "@sentry/node";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createAssessmentServiceFromEnv, type EnvSource } from "./index.js";

vi.mock("@sentry/node", () => ({
  init: vi.fn(),
  captureException: vi.fn(),
}));

describe("createAssessmentServiceFromEnv", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "response-quality-service-"));
    vi.mocked(Sentry.init).mockClear();
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  it("applies thresholds from the project .env", () => {
    writeFileSync(join(cwd, ".env"), "QUALITY_ITEM_COUNT=10\nNODE_ENV=test\n");
    const env: EnvSource = {};
    const service = createAssessmentServiceFromEnv({ cwd, env });

    const result = service.assess({
      userId: "user-1",
      responses: [1, 2, 3, 4, 1, 2, 3, 4, 1, 2],
      responseTimes: new Array<number>(10).fill(4),
    });

    expect(env.QUALITY_ITEM_COUNT).toBe("10");
    expect(result.status).toBe("success");
    expect(Sentry.init).not.toHaveBeenCalled();
  });

  it("enables error reporting when a DSN is configured", () => {
    createAssessmentServiceFromEnv({
      cwd,
      env: { SENTRY_DSN: "https://public@sentry.example.com/1", NODE_ENV: "production" },
    });

    expect(Sentry.init).toHaveBeenCalledWith({
      dsn: "https://public@sentry.example.com/1",
      environment: "production",
    });
  });
});

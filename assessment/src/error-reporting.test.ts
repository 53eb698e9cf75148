import * as Sentry from "@sentry/node";
import { InvalidInputError } from "@response-quality/core";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { createErrorReporter } from "./error-reporting.js";

vi.mock("@sentry/node", () => ({
  init: vi.fn(),
  captureException: vi.fn(),
}));

describe("createErrorReporter", () => {
  beforeEach(() => {
    vi.mocked(Sentry.init).mockClear();
    vi.mocked(Sentry.captureException).mockClear();
  });

  it("stays disabled without a DSN", () => {
    const reporter = createErrorReporter({ dsn: null, environment: "test" });

    reporter.report(new Error("boom"));

    expect(reporter.enabled).toBe(false);
    expect(Sentry.init).not.toHaveBeenCalled();
    expect(Sentry.captureException).not.toHaveBeenCalled();
  });

  it("initialises Sentry and captures unexpected errors", () => {
    const reporter = createErrorReporter({
      dsn: "https://public@sentry.example.com/1",
      environment: "production",
    });
    const error = new Error("boom");

    reporter.report(error, { userId: "user-1" });

    expect(reporter.enabled).toBe(true);
    expect(Sentry.init).toHaveBeenCalledWith({
      dsn: "https://public@sentry.example.com/1",
      environment: "production",
    });
    expect(Sentry.captureException).toHaveBeenCalledWith(error, { extra: { userId: "user-1" } });
  });

  it("never reports input errors", () => {
    const reporter = createErrorReporter({
      dsn: "https://public@sentry.example.com/1",
      environment: "production",
    });

    reporter.report(new InvalidInputError("responses.range", "bad answer"));

    expect(Sentry.captureException).not.toHaveBeenCalled();
  });
});

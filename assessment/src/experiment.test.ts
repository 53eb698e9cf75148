import { describe, expect, it } from "vitest";

import { assignExperimentGroup } from "./experiment.js";

describe("assignExperimentGroup", () => {
  it("assigns groups from the user id digest", () => {
    expect(assignExperimentGroup("user-0")).toBe("control");
    expect(assignExperimentGroup("user-4")).toBe("treatment");
    expect(assignExperimentGroup("alice@example.com")).toBe("treatment");
  });

  it("is stable across calls", () => {
    const groups = Array.from({ length: 5 }, () => assignExperimentGroup("user-6"));

    expect(new Set(groups)).toEqual(new Set(["treatment"]));
  });
});

import { describe, expect, it } from "vitest";
import { resolveLimits } from "./limits.js";

describe("resolveLimits", () => {
  it("should return defaults when nothing is given", () => {
    expect(resolveLimits()).toEqual({
      maxNestingDepth: 100,
      maxInputSize: 1_000_000,
      maxInvocationDepth: 8,
    });
  });

  it("should override only the limits that are set", () => {
    expect(resolveLimits({ maxNestingDepth: 5 })).toEqual({
      maxNestingDepth: 5,
      maxInputSize: 1_000_000,
      maxInvocationDepth: 8,
    });
  });

  it("should return a fresh object each time", () => {
    const limits = resolveLimits();
    limits.maxNestingDepth = 1;
    expect(resolveLimits().maxNestingDepth).toBe(100);
  });
});

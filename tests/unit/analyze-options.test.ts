import { describe, expect, it } from "vitest";

import {
  resolveExcludePatterns,
  resolveReportOptions,
} from "../../src/cli/commands/analyze.js";

describe("resolveReportOptions", () => {
  it("defaults to over 0, no top and no average", () => {
    expect(resolveReportOptions({}, {})).toEqual({
      over: 0,
      top: undefined,
      avg: false,
    });
  });

  it("takes values from the config", () => {
    expect(
      resolveReportOptions({}, { depth: { over: 3, top: 5, avg: true } }),
    ).toEqual({ over: 3, top: 5, avg: true });
  });

  it("lets flags override the config", () => {
    expect(
      resolveReportOptions(
        { over: 1, top: 0 },
        { depth: { over: 3, top: 5, avg: true } },
      ),
    ).toEqual({ over: 1, top: 0, avg: true });
  });
});

describe("resolveExcludePatterns", () => {
  it("puts config patterns before flag patterns", () => {
    expect(
      resolveExcludePatterns(
        { exclude: ["**/*.test.ts"] },
        { files: { exclude: ["**/generated/**"] } },
      ),
    ).toEqual(["**/generated/**", "**/*.test.ts"]);
  });

  it("returns nothing when neither sets patterns", () => {
    expect(resolveExcludePatterns({}, {})).toEqual([]);
  });
});

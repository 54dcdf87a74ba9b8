import { describe, expect, it } from "vitest";

import {
  averageDepth,
  buildReport,
  selectStats,
  sortByDepth,
} from "../../src/report/stats.js";
import { stat } from "../utils/source.js";

describe("sortByDepth", () => {
  it("orders by depth, deepest first", () => {
    const sorted = sortByDepth([stat(5), stat(2), stat(8)]);

    expect(sorted.map((s) => s.depth)).toEqual([8, 5, 2]);
  });

  it("keeps discovery order for equal depths", () => {
    const sorted = sortByDepth([
      stat(1, "first"),
      stat(3, "deep"),
      stat(1, "second"),
      stat(1, "third"),
    ]);

    expect(sorted.map((s) => s.name)).toEqual([
      "deep",
      "first",
      "second",
      "third",
    ]);
  });

  it("does not modify its input", () => {
    const stats = [stat(1), stat(2)];
    sortByDepth(stats);

    expect(stats.map((s) => s.depth)).toEqual([1, 2]);
  });
});

describe("selectStats", () => {
  const sorted = sortByDepth([stat(8), stat(5), stat(2), stat(0)]);

  it("keeps records deeper than over", () => {
    expect(selectStats(sorted, { over: 4 }).map((s) => s.depth)).toEqual([
      8, 5,
    ]);
  });

  it("keeps everything above depth 0 by default", () => {
    expect(selectStats(sorted, { over: 0 }).map((s) => s.depth)).toEqual([
      8, 5, 2,
    ]);
  });

  it("takes the top n records", () => {
    expect(selectStats(sorted, { over: -1, top: 3 }).map((s) => s.depth)).toEqual(
      [8, 5, 2],
    );
    expect(selectStats(sorted, { over: -1, top: 10 })).toHaveLength(4);
    expect(selectStats(sorted, { over: -1, top: 0 })).toEqual([]);
  });

  it("applies top before over", () => {
    expect(selectStats(sorted, { over: 1, top: 1 }).map((s) => s.depth)).toEqual([
      8,
    ]);
  });

  it("returns nothing when no record exceeds over", () => {
    expect(selectStats(sorted, { over: 8 })).toEqual([]);
  });
});

describe("averageDepth", () => {
  it("averages over all records", () => {
    expect(averageDepth([stat(5), stat(2), stat(8)])).toBe(5);
  });

  it("is NaN without records", () => {
    expect(averageDepth([])).toBeNaN();
  });
});

describe("buildReport", () => {
  const stats = [stat(5), stat(2), stat(8)];

  it("reports the sorted records", () => {
    const report = buildReport(stats, { over: 0, avg: false });

    expect(report.analyzed).toBe(3);
    expect(report.reported.map((s) => s.depth)).toEqual([8, 5, 2]);
    expect(report.average).toBeUndefined();
    expect(report.thresholdExceeded).toBe(false);
  });

  it("flags a threshold violation when over is set", () => {
    const report = buildReport(stats, { over: 4, avg: true });

    expect(report.reported.map((s) => s.depth)).toEqual([8, 5]);
    expect(report.thresholdExceeded).toBe(true);
  });

  it("does not flag when nothing exceeds over", () => {
    const report = buildReport(stats, { over: 8, avg: false });

    expect(report.reported).toEqual([]);
    expect(report.thresholdExceeded).toBe(false);
  });

  it("averages the unfiltered records", () => {
    const report = buildReport(stats, { over: 6, top: 1, avg: true });

    expect(report.reported.map((s) => s.depth)).toEqual([8]);
    expect(report.average).toBe(5);
  });
});

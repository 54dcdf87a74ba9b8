import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  AnalysisError,
  analyzeFile,
  analyzePaths,
} from "../../src/depth/index.js";

describe("depth analysis", () => {
  let tmpDir: string;

  function createFile(relativePath: string, content: string): string {
    const fullPath = join(tmpDir, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
    return fullPath;
  }

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "tsdepth-depth-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("analyzeFile", () => {
    it("scores every declaration in a file", () => {
      const filePath = createFile(
        "lib/queue.ts",
        `export class Queue {
  drain(items: number[]) {
    while (items.length > 0) {
      if (items.pop() === 0) {
        break;
      }
    }
  }
}

export function size() {
  return 0;
}
`,
      );

      expect(analyzeFile(filePath)).toEqual([
        {
          module: "queue",
          name: "(Queue).drain",
          depth: 2,
          position: { file: filePath, line: 2, column: 3 },
        },
        {
          module: "queue",
          name: "size",
          depth: 0,
          position: { file: filePath, line: 11, column: 1 },
        },
      ]);
    });
  });

  describe("analyzePaths", () => {
    it("keeps discovery order across paths", () => {
      const single = createFile("single.js", "function one() { if (x) { y(); } }\n");
      createFile("dir/b.ts", "export function b() {}\n");
      createFile("dir/a.ts", "export function a() {}\n");

      const stats = analyzePaths([single, join(tmpDir, "dir")]);

      expect(stats.map((s) => `${s.module}.${s.name}`)).toEqual([
        "single.one",
        "a.a",
        "b.b",
      ]);
    });

    it("skips excluded files", () => {
      createFile("dir/a.ts", "export function a() {}\n");
      createFile("dir/a.test.ts", "export function suite() {}\n");

      const stats = analyzePaths([join(tmpDir, "dir")], {
        exclude: ["**/*.test.ts"],
      });

      expect(stats.map((s) => s.name)).toEqual(["a"]);
    });

    it("fails on the first file that does not parse", () => {
      createFile("dir/a.ts", "export function a() {}\n");
      createFile("dir/b.ts", "export function b( {\n");

      expect(() => analyzePaths([join(tmpDir, "dir")])).toThrow(AnalysisError);
    });
  });
});

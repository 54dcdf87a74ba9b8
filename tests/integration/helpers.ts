import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { type MockInstance, vi } from "vitest";

import { run } from "../../src/cli/program.js";

export interface ExecResult {
  stdout: string[];
  stderr: string[];
  exitCode: number;
}

/** Run the CLI in process, capturing console output line by line */
export async function runCLI(args: string[]): Promise<ExecResult> {
  const log: MockInstance<typeof console.log> = vi
    .spyOn(console, "log")
    .mockImplementation(() => undefined);
  const error: MockInstance<typeof console.error> = vi
    .spyOn(console, "error")
    .mockImplementation(() => undefined);

  try {
    const exitCode = await run(args);
    return {
      stdout: log.mock.calls.map((call) => call.map(String).join(" ")),
      stderr: error.mock.calls.map((call) => call.map(String).join(" ")),
      exitCode,
    };
  } finally {
    log.mockRestore();
    error.mockRestore();
  }
}

export class TestProject {
  public path = "";

  async setup(): Promise<void> {
    this.path = await mkdtemp(join(tmpdir(), "tsdepth-test-"));
  }

  async cleanup(): Promise<void> {
    await rm(this.path, { recursive: true, force: true });
  }

  async createFile(relativePath: string, content: string): Promise<string> {
    const fullPath = join(this.path, relativePath);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content);
    return fullPath;
  }

  file(relativePath: string): string {
    return join(this.path, relativePath);
  }

  // Run inside the project so a tsdepth.toml above the repo is never found
  async run(args: string[]): Promise<ExecResult> {
    const previous = process.cwd();
    process.chdir(this.path);
    try {
      return await runCLI(args);
    } finally {
      process.chdir(previous);
    }
  }
}

// Depth 5
export const deepSource = `export function deepest(a: boolean) {
  if (a) {
    for (;;) {
      while (a) {
        do {
          try {
            a = false;
          } catch {
            a = true;
          }
        } while (a);
      }
    }
  }
}
`;

// Depth 2 then depth 8 in one class
export const classSource = `export class Walker {
  step(a: boolean) {
    if (a) {
      if (a) {
        a = false;
      }
    }
  }

  static run(a: boolean) {
    if (a) {
      if (a) {
        if (a) {
          if (a) {
            if (a) {
              if (a) {
                if (a) {
                  if (a) {
                    a = false;
                  }
                }
              }
            }
          }
        }
      }
    }
  }
}
`;

// Depth 0
export const flatSource = `export const flat = (n: number) => n + 1;
`;

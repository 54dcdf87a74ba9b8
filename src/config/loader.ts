import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { dirname, join, resolve } from "path";
import { z } from "zod";

export const CONFIG_FILENAME = "tsdepth.toml";

// Custom error class for configuration errors (exit code 2)
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const depthSchema = z
  .object({
    over: z.number().int(),
    top: z.number().int().nonnegative(),
    avg: z.boolean(),
  })
  .partial()
  .strict();

const filesSchema = z.object({
  exclude: z.array(z.string().min(1, "pattern cannot be empty")).optional(),
});

// Full tsdepth.toml schema
export const configSchema = z.object({
  depth: depthSchema.optional(),
  files: filesSchema.optional(),
});

export type Config = z.infer<typeof configSchema>;

// Strip Symbol keys from an object (recursively)
// @iarna/toml adds Symbol keys for metadata that interfere with Zod validation
export function stripSymbolKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stripSymbolKeys);
  }
  if (value === null || typeof value !== "object") {
    return value;
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, entry]): [string, unknown] => [
      key,
      stripSymbolKeys(entry),
    ]),
  );
}

async function parseTomlFile(configPath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read ${configPath}: ${message}`);
  }

  const TOML = await import("@iarna/toml");
  try {
    return stripSymbolKeys(TOML.parse(content));
  } catch (error) {
    const message = error instanceof Error ? error.message : "Parse error";
    throw new ConfigError(`Invalid TOML in ${configPath}: ${message}`);
  }
}

function formatZodErrors(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const pathStr = issue.path.map((p) => String(p)).join(".");
      return `  - ${pathStr}: ${issue.message}`;
    })
    .join("\n");
}

/**
 * Load and validate a tsdepth.toml file.
 * @throws ConfigError if the file is unreadable, not TOML, or fails validation
 */
export async function loadConfig(configPath: string): Promise<Config> {
  const parsed = await parseTomlFile(configPath);
  const result = configSchema.safeParse(parsed);

  if (!result.success) {
    throw new ConfigError(
      `Invalid ${configPath}:\n${formatZodErrors(result.error.issues)}`,
    );
  }

  return result.data;
}

/**
 * Find the nearest tsdepth.toml, searching from startDir upward.
 * @returns Absolute path to the config file, or undefined when there is none
 */
export function findConfigFile(startDir: string = process.cwd()): string | undefined {
  let dir = resolve(startDir);

  for (;;) {
    const candidate = join(dir, CONFIG_FILENAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

/**
 * Load the explicitly named config file, or the nearest one if any.
 */
export async function resolveConfig(
  configPath: string | undefined,
  startDir?: string,
): Promise<Config> {
  if (configPath !== undefined) {
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return loadConfig(configPath);
  }

  const found = findConfigFile(startDir);
  return found === undefined ? {} : loadConfig(found);
}

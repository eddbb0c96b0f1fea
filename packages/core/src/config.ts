/**
 * Flo runtime configuration loader.
 *
 * Precedence: ./.florc.json > ~/.flo/config.json > built-in defaults.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";

export const runtimeConfigSchema = z
  .object({
    strands: z
      .object({
        maxConcurrent: z.number().int().min(0).default(0),
        timeoutMs: z.number().int().min(0).default(0),
      })
      .strict()
      .default({}),
    limits: z
      .object({
        maxCallDepth: z.number().int().positive().default(10000),
      })
      .strict()
      .default({}),
  })
  .strict();

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

export interface ResolvedConfig {
  config: RuntimeConfig;
  source: "project" | "user" | "default";
  path: string | null;
}

export class ConfigError extends Error {
  readonly path: string;
  readonly issues: string[];

  constructor(filePath: string, issues: string[]) {
    super(`Invalid configuration in ${filePath}: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.path = filePath;
    this.issues = issues;
  }
}

export const DEFAULT_CONFIG: RuntimeConfig = runtimeConfigSchema.parse({});

export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), ".florc.json");
  const userPath = path.join(homeDir ?? os.homedir(), ".flo", "config.json");

  const projectConfig = tryLoadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = tryLoadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null };
}

/** Returns null when the file does not exist; throws ConfigError when it is invalid. */
function tryLoadConfigFile(filePath: string): RuntimeConfig | null {
  if (!fs.existsSync(filePath)) return null;
  const raw = fs.readFileSync(filePath, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(filePath, [e instanceof Error ? e.message : String(e)]);
  }
  return parseConfig(data, filePath);
}

export function parseConfig(data: unknown, source = "<config>"): RuntimeConfig {
  const result = runtimeConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
    );
    throw new ConfigError(source, issues);
  }
  return result.data;
}

/**
 * Quilt configuration loader.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import { DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT } from "./context.js";

export const ConfigSchema = z
  .object({
    version: z.literal(1).default(1),
    maxDepth: z.number().int().positive().max(MAX_DEPTH_LIMIT).default(DEFAULT_MAX_DEPTH),
    indent: z.number().int().min(0).max(10).default(2),
    std: z.boolean().default(true),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

export interface ResolvedConfig {
  config: Config;
  source: "project" | "user" | "default";
  path: string | null;
}

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

/**
 * Resolve configuration.
 * Precedence: ./.quiltrc.json > ~/.quilt/config.json > defaults
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), ".quiltrc.json");
  const userPath = path.join(homeDir ?? os.homedir(), ".quilt", "config.json");

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

export function loadConfig(cwd?: string, homeDir?: string): Config {
  return resolveConfig(cwd, homeDir).config;
}

/** Parse and validate one config file; throws with the zod issues. */
export function parseConfig(raw: string): Config {
  const result = ConfigSchema.safeParse(JSON.parse(raw));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid config: ${issues.join("; ")}`);
  }
  return result.data;
}

// Unreadable or invalid files are skipped so the next source applies.
function tryLoadConfigFile(filePath: string): Config | null {
  if (!fs.existsSync(filePath)) return null;
  try {
    return parseConfig(fs.readFileSync(filePath, "utf-8"));
  } catch {
    return null;
  }
}

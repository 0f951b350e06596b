// Config loader: reads rawnet-build.yaml from the project root (or RAWNET_BUILD_CONFIG).
// No file means defaults; a file that does not parse or validate stops the run.
// Config shape and defaults live in config/schema.ts.
import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { projectConfigSchema, DEFAULT_CONFIG } from "./schema.js";
import type { ProjectConfig } from "./schema.js";
import { BuildError, BuildErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export const CONFIG_FILE_NAME = "rawnet-build.yaml";

export interface ConfigResult {
  config: ProjectConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(root: string, explicitPath?: string): ConfigResult {
  const configPath = resolve(root, explicitPath ?? CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    if (explicitPath) {
      throw new BuildError(BuildErrorCode.INVALID_CONFIG, `Config file not found: ${configPath}`);
    }
    logger.debug({ configPath }, "No config file; using defaults");
    return { config: DEFAULT_CONFIG, configPath, fromFile: false };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new BuildError(
      BuildErrorCode.INVALID_CONFIG,
      `Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  // An empty document parses to null; treat it like an empty mapping.
  const result = projectConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new BuildError(BuildErrorCode.INVALID_CONFIG, `Invalid config in ${configPath}: ${issues.join("; ")}`, 1, {
      issues,
    });
  }

  logger.debug({ configPath }, "Configuration loaded");
  return { config: result.data, configPath, fromFile: true };
}

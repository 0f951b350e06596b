// Toolchain resolver: looks up each external tool once at startup.
// Absence is normal: handlers branch on the result (package tool vs direct compiler)
// and, where a fallback tool is missing too, still attempt it by bare name.
import type { ToolName, ToolchainConfig } from "../types/toolchain.js";
import type { Executor } from "../execution/executor.js";
import { logger } from "../logger.js";

/** Executable names tried for each tool, in order of preference. */
export const TOOL_CANDIDATES: Readonly<Record<ToolName, readonly [string, ...string[]]>> = {
  packageTool: ["cargo"],
  compiler: ["rustc"],
  docGenerator: ["rustdoc"],
  cCompiler: ["clang", "gcc"],
  elevation: ["sudo"],
};

/** Locate the first candidate on PATH; null when none is found. */
export async function locateTool(executor: Executor, candidates: readonly string[]): Promise<string | null> {
  for (const name of candidates) {
    const result = await executor.capture({ argv: ["which", name] });
    const path = result.stdout.split("\n")[0]?.trim();
    if (result.exitCode === 0 && path) return path;
  }
  return null;
}

export async function resolveToolchain(executor: Executor): Promise<ToolchainConfig> {
  const packageTool = await locateTool(executor, TOOL_CANDIDATES.packageTool);
  const toolchain: ToolchainConfig = {
    packageTool,
    compiler: await locateTool(executor, TOOL_CANDIDATES.compiler),
    docGenerator: await locateTool(executor, TOOL_CANDIDATES.docGenerator),
    cCompiler: await locateTool(executor, TOOL_CANDIDATES.cCompiler),
    elevation: await locateTool(executor, TOOL_CANDIDATES.elevation),
    hasPackageTool: packageTool !== null,
  };
  logger.debug({ toolchain }, "Toolchain resolved");
  return toolchain;
}

/** Path to invoke for a tool: the resolved one, or its preferred bare name. */
export function toolCommand(toolchain: ToolchainConfig, tool: ToolName): string {
  return toolchain[tool] ?? TOOL_CANDIDATES[tool][0];
}

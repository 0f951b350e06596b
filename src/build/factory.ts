// Factory for the build strategy. Called once during bootstrap; the returned
// BuildStrategy goes into BuildContext and every handler builds its commands through it.
import type { ToolchainConfig } from "../types/toolchain.js";
import type { ProjectConfig } from "../config/schema.js";
import type { ProjectPaths } from "../config/paths.js";
import type { BuildStrategy } from "./strategy.js";
import { PackageToolStrategy } from "./package-tool.js";
import { DirectToolStrategy } from "./direct.js";
import { toolCommand } from "../toolchain/resolver.js";
import { logger } from "../logger.js";

export function createBuildStrategy(
  toolchain: ToolchainConfig,
  config: ProjectConfig,
  paths: ProjectPaths,
  verbose: boolean,
): BuildStrategy {
  if (toolchain.hasPackageTool && toolchain.packageTool) {
    return new PackageToolStrategy({ tool: toolchain.packageTool, outputDir: paths.output, verbose });
  }

  logger.info("Package-build tool not found; compiling the entry file directly");
  return new DirectToolStrategy({
    compiler: toolCommand(toolchain, "compiler"),
    docGenerator: toolCommand(toolchain, "docGenerator"),
    libraryName: config.library.name,
    paths,
    verbose,
  });
}

import type { BuildContext } from "./operations/context.js";
import type { Executor } from "./execution/executor.js";
import { LocalExecutor } from "./execution/executor.js";
import { loadConfig } from "./config/loader.js";
import { readConfigPath, readSettings } from "./config/environment.js";
import { resolveProjectPaths } from "./config/paths.js";
import { resolveToolchain } from "./toolchain/resolver.js";
import { detectPlatform } from "./platform/classifier.js";
import { discoverInterface } from "./platform/interface.js";
import { createBuildStrategy } from "./build/factory.js";
import { logger } from "./logger.js";

export interface BootstrapOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Defaults to a LocalExecutor rooted at cwd. */
  executor?: Executor;
  uid?: number;
}

/**
 * Discover everything the handlers need, once, before dispatch:
 * config, toolchain, platform class and the test interface hint.
 */
export async function createBuildContext(options: BootstrapOptions): Promise<BuildContext> {
  const { cwd, env } = options;

  // ── Phase 1: Config and environment ───────────────────────────
  const { config, configPath, fromFile } = loadConfig(cwd, readConfigPath(env));
  const settings = readSettings(env, config);
  if (settings.verbose && !env.LOG_LEVEL) logger.level = "debug";
  logger.debug({ configPath, fromFile }, "Configuration ready");

  const executor = options.executor ?? new LocalExecutor({ cwd, trace: settings.verbose });
  const paths = resolveProjectPaths(cwd, config);

  // ── Phase 2: Host discovery ───────────────────────────────────
  const toolchain = await resolveToolchain(executor);
  const platform = await detectPlatform(executor, options.uid);
  const interfaceName = await discoverInterface(executor, settings.interfaceOverride);

  // ── Phase 3: Strategy selection ───────────────────────────────
  const strategy = createBuildStrategy(toolchain, config, paths, settings.verbose);

  return { config, paths, settings, toolchain, platform, interfaceName, strategy, executor };
}

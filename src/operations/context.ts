import type { ProjectConfig } from "../config/schema.js";
import type { ProjectPaths } from "../config/paths.js";
import type { RuntimeSettings } from "../config/environment.js";
import type { ToolchainConfig } from "../types/toolchain.js";
import type { PlatformInfo } from "../types/platform.js";
import type { BuildStrategy } from "../build/strategy.js";
import type { Executor } from "../execution/executor.js";

/**
 * Shared build context: everything discovered at startup.
 * Created once by bootstrap, read-only afterwards, passed to every operation handler.
 */
export interface BuildContext {
  readonly config: ProjectConfig;
  readonly paths: ProjectPaths;
  readonly settings: RuntimeSettings;
  readonly toolchain: ToolchainConfig;
  readonly platform: PlatformInfo;
  /** Active interface hint for raw-socket tests; "" when none was found. */
  readonly interfaceName: string;
  readonly strategy: BuildStrategy;
  readonly executor: Executor;
}

export type OperationHandler = (ctx: BuildContext) => Promise<void>;

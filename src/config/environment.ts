import type { ProjectConfig } from "./schema.js";

/** Settings taken from the caller's environment. */
export interface RuntimeSettings {
  /** VERBOSE=1: widen tool invocations and trace every command. */
  readonly verbose: boolean;
  /** Caller-supplied interface name; when set, discovery is skipped. */
  readonly interfaceOverride: string | undefined;
}

/** Explicit config file from RAWNET_BUILD_CONFIG, if any. */
export function readConfigPath(env: NodeJS.ProcessEnv): string | undefined {
  return env.RAWNET_BUILD_CONFIG || undefined;
}

export function readSettings(env: NodeJS.ProcessEnv, config: ProjectConfig): RuntimeSettings {
  return {
    verbose: env.VERBOSE === "1",
    interfaceOverride: env[config.testing.interface_variable] || undefined,
  };
}

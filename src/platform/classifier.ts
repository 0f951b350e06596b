import { type as osType } from "node:os";
import type { PlatformClass, PlatformInfo } from "../types/platform.js";
import type { Executor } from "../execution/executor.js";
import { logger } from "../logger.js";

/** Map an OS name as printed by `uname -s` to its platform class. */
export function classifyPlatform(osName: string): PlatformClass {
  if (osName === "Linux") return "linux";
  if (osName === "FreeBSD" || osName === "Darwin") return "bsd-darwin";
  if (osName.startsWith("MINGW") || osName.startsWith("MSYS")) return "windows-compat";
  return "unsupported";
}

/** Ask `uname -s` for the OS name; Node's os.type() stands in when uname cannot run. */
export async function readOsName(executor: Executor): Promise<string> {
  const result = await executor.capture({ argv: ["uname", "-s"] });
  const name = result.stdout.trim();
  if (result.exitCode === 0 && name) return name;
  logger.debug({ exitCode: result.exitCode }, "uname unavailable; using os.type()");
  return osType();
}

export async function detectPlatform(executor: Executor, uid: number | undefined = process.getuid?.()): Promise<PlatformInfo> {
  const osName = await readOsName(executor);
  const platform: PlatformInfo = {
    osName,
    platformClass: classifyPlatform(osName),
    isPrivileged: uid === 0,
  };
  logger.debug({ platform }, "Platform detected");
  return platform;
}

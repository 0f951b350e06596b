// Interface discovery: best-effort pick of an active, non-loopback interface for the
// raw-socket tests. Only the BSD/Darwin and Windows-compat test runs consume the result.
// Every failure mode collapses to "" (no hint); nothing here may abort the run.
import type { Executor } from "../execution/executor.js";
import { logger } from "../logger.js";

const STATUS_LINE = /UP| active/;
const ACTIVE_STATUS = / active\b/;
const INTERFACE_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Scan `ifconfig` output for the first interface reporting an active status.
 *
 * Keeps only `UP`/`active` lines, finds the first `active` one, and takes the
 * name (text before `:`) from the line just above it. First match wins.
 */
export function parseActiveInterface(output: string): string {
  const lines = output.split(/\r?\n/).filter((line) => STATUS_LINE.test(line));
  const activeIndex = lines.findIndex((line) => ACTIVE_STATUS.test(line));
  if (activeIndex <= 0) return "";

  const name = lines[activeIndex - 1].split(":")[0].trim();
  return INTERFACE_NAME.test(name) ? name : "";
}

/** Resolve the interface hint, preferring a caller-supplied override. */
export async function discoverInterface(executor: Executor, override?: string): Promise<string> {
  if (override) {
    logger.debug({ interfaceName: override }, "Using caller-supplied test interface");
    return override;
  }

  try {
    const result = await executor.capture({ argv: ["ifconfig"] });
    if (result.exitCode !== 0) {
      logger.debug({ exitCode: result.exitCode }, "ifconfig failed; no interface hint");
      return "";
    }
    const interfaceName = parseActiveInterface(result.stdout);
    logger.debug({ interfaceName }, "Interface discovery complete");
    return interfaceName;
  } catch (err) {
    logger.warn({ error: err }, "Interface discovery failed; continuing without a hint");
    return "";
  }
}

// Privilege strategy for the raw-socket test run: the one place escalation policy lives.
// planTestRun() is pure: it turns platform facts into a tagged plan, and the RunTests
// handler executes whatever the plan says. Adding a platform class means adding a case here.
import type { Command } from "../types/command.js";
import type { PlatformInfo } from "../types/platform.js";

/** Environment that pins the test harness to one task at a time. */
export const SERIAL_TEST_ENV: Readonly<Record<string, string>> = {
  RUST_TEST_TASKS: "1",
  RUST_TEST_THREADS: "1",
};

export type TestRunPlan =
  /** Linux: grant the capability to the binaries, then run as the invoking user. */
  | { readonly kind: "capability-grant"; readonly grant: Command | null; readonly runners: Command[] }
  /** BSD/Darwin: run the whole test runner through the elevation utility. */
  | { readonly kind: "elevated-run"; readonly runners: Command[] }
  /** Windows compatibility layer: run directly, no elevation. */
  | { readonly kind: "direct-run"; readonly runners: Command[] }
  | { readonly kind: "unsupported"; readonly osName: string };

export interface TestRunInput {
  readonly platform: PlatformInfo;
  /** Resolved elevation utility; null runs privileged steps without it. */
  readonly elevation: string | null;
  readonly runners: readonly Command[];
  readonly binaries: readonly string[];
  readonly interfaceName: string;
  readonly interfaceVariable: string;
  readonly capability: string;
}

export function planTestRun(input: TestRunInput): TestRunPlan {
  const { platform, elevation, runners } = input;
  const hintedEnv = { [input.interfaceVariable]: input.interfaceName, ...SERIAL_TEST_ENV };

  switch (platform.platformClass) {
    case "linux":
      return {
        kind: "capability-grant",
        grant: platform.isPrivileged ? null : elevated(elevation, ["setcap", input.capability, ...input.binaries]),
        runners: runners.map((runner) => withEnv(runner, SERIAL_TEST_ENV)),
      };
    case "bsd-darwin":
      return {
        kind: "elevated-run",
        runners: runners.map((runner) => elevated(elevation, runner.argv, { ...runner.env, ...hintedEnv })),
      };
    case "windows-compat":
      return { kind: "direct-run", runners: runners.map((runner) => withEnv(runner, hintedEnv)) };
    case "unsupported":
      return { kind: "unsupported", osName: platform.osName };
  }
}

function withEnv(command: Command, env: Record<string, string>): Command {
  return { argv: command.argv, env: { ...command.env, ...env } };
}

/**
 * Prefix argv with the elevation utility. Environment is passed as `KEY=value`
 * arguments because the utility resets the child environment.
 */
function elevated(elevation: string | null, argv: string[], env?: Record<string, string>): Command {
  if (!elevation) return env ? { argv, env } : { argv };
  const assignments = Object.entries(env ?? {}).map(([key, value]) => `${key}=${value}`);
  return { argv: [elevation, ...assignments, ...argv] };
}

// RunTests: build the test artifacts, then run them under the platform's privilege model.
// Ordering is the contract: nothing privileged happens until the artifact build succeeded,
// and the unsupported platform class never reaches the test runner.
import type { BuildContext } from "./context.js";
import { buildTestArtifact } from "./test-artifact.js";
import { runSequence, runStep } from "./steps.js";
import { findTestBinaries } from "../build/artifacts.js";
import { planTestRun } from "../privilege/strategy.js";
import { formatCommand } from "../execution/executor.js";
import { BuildError, BuildErrorCode } from "../shared/errors.js";
import { announce, logger } from "../logger.js";

export const PRIVILEGE_NOTICE = "Setting permissions for test suite - enter sudo password if prompted";

export async function runTests(ctx: BuildContext): Promise<void> {
  try {
    await buildTestArtifact(ctx);
  } catch (err) {
    if (err instanceof BuildError) {
      throw new BuildError(BuildErrorCode.ARTIFACT_BUILD_FAILED, `Test artifact build failed: ${err.message}`, err.exitCode, err.context);
    }
    throw err;
  }

  announce(PRIVILEGE_NOTICE);

  const { strategy, config, toolchain } = ctx;
  const binaries = await findTestBinaries(strategy.testBinaryDir, config.library.name);
  const plan = planTestRun({
    platform: ctx.platform,
    elevation: toolchain.elevation,
    runners: strategy.testRunners(binaries),
    binaries,
    interfaceName: ctx.interfaceName,
    interfaceVariable: config.testing.interface_variable,
    capability: config.testing.capability,
  });

  if (plan.kind === "unsupported") {
    throw new BuildError(BuildErrorCode.UNSUPPORTED_PLATFORM, `Unsupported testing platform: ${plan.osName}`, 1, {
      osName: plan.osName,
    });
  }

  const grantsCapability = plan.kind === "capability-grant" && plan.grant !== null;
  if ((grantsCapability || plan.runners.length === 0) && binaries.length === 0) {
    throw new BuildError(
      BuildErrorCode.ARTIFACT_BUILD_FAILED,
      `No test binaries named ${config.library.name}-* found in ${strategy.testBinaryDir}`,
    );
  }

  if (!toolchain.elevation && (grantsCapability || plan.kind === "elevated-run")) {
    logger.warn({ platform: ctx.platform.platformClass }, "Elevation utility not found; running privileged step without it");
  }

  switch (plan.kind) {
    case "capability-grant":
      if (plan.grant) {
        // Mutates the binaries on disk, outside this process; keep it visible.
        announce(`Granting ${config.testing.capability} to ${binaries.length} test binar${binaries.length === 1 ? "y" : "ies"}`);
        logger.warn({ argv: plan.grant.argv }, "Applying capability grant to test binaries");
        await runStep(ctx.executor, plan.grant);
      } else {
        logger.info("Already running as root; skipping capability grant");
      }
      break;
    case "elevated-run":
      logger.info({ command: plan.runners.map(formatCommand) }, "Running test suite with elevated privileges");
      break;
    case "direct-run":
      logger.info({ command: plan.runners.map(formatCommand) }, "Running test suite without elevation");
      break;
  }

  await runSequence(ctx.executor, plan.runners);
}

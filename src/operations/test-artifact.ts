import type { BuildContext } from "./context.js";
import { runSequence } from "./steps.js";

/** Compile, but do not run, the test (and benchmark) artifacts. */
export async function buildTestArtifact(ctx: BuildContext): Promise<void> {
  await runSequence(ctx.executor, ctx.strategy.testArtifacts());
}

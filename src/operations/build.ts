import type { BuildContext } from "./context.js";
import { runSequence } from "./steps.js";

/** Release build of the library. */
export async function build(ctx: BuildContext): Promise<void> {
  await runSequence(ctx.executor, ctx.strategy.build());
}

import type { BuildContext } from "./context.js";
import { runSequence } from "./steps.js";

/** API docs; the direct path writes into `<out>/doc`, which the dispatcher creates. */
export async function buildDocs(ctx: BuildContext): Promise<void> {
  await runSequence(ctx.executor, ctx.strategy.docs());
}

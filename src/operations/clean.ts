import fs from "node:fs/promises";
import type { BuildContext } from "./context.js";
import { runStep } from "./steps.js";
import { logger } from "../logger.js";

export async function clean(ctx: BuildContext): Promise<void> {
  const action = ctx.strategy.clean();
  switch (action.kind) {
    case "command":
      await runStep(ctx.executor, action.command);
      return;
    case "remove":
      // force: an already-clean tree is success
      await fs.rm(action.path, { recursive: true, force: true });
      logger.debug({ path: action.path }, "Removed build output");
      return;
  }
}

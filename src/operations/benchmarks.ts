import path from "node:path";
import type { Command } from "../types/command.js";
import type { BuildContext } from "./context.js";
import { runSequence } from "./steps.js";
import { toolCommand } from "../toolchain/resolver.js";
import { announce } from "../logger.js";

/**
 * Native and library-language benchmark binaries, written to `<out>/benches`.
 * The library-language ones link against the release build output.
 */
export async function buildBenchmarks(ctx: BuildContext): Promise<void> {
  if (ctx.platform.osName !== "Darwin") {
    announce("warning: C benchmarks only work on OS X");
  }

  const { paths, config, toolchain } = ctx;
  const cc = toolCommand(toolchain, "cCompiler");
  const compiler = toolCommand(toolchain, "compiler");

  const native: Command[] = config.benchmarks.native.map((source) => ({
    argv: [
      cc,
      "-W",
      "-Wall",
      "-O2",
      path.resolve(paths.root, source),
      "-o",
      path.join(paths.benches, path.parse(source).name),
    ],
  }));
  const library: Command[] = config.benchmarks.library.map((source) => ({
    argv: [compiler, "-O", path.resolve(paths.root, source), "--out-dir", paths.benches, "-L", paths.release],
  }));

  await runSequence(ctx.executor, [...native, ...library]);
}

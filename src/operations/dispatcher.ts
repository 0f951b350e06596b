import fs from "node:fs/promises";
import type { ProjectPaths } from "../config/paths.js";
import type { BuildContext, OperationHandler } from "./context.js";
import { build } from "./build.js";
import { buildDocs } from "./docs.js";
import { runTests } from "./run-tests.js";
import { clean } from "./clean.js";
import { buildBenchmarks } from "./benchmarks.js";
import { logger } from "../logger.js";

export type Verb = "build" | "doc" | "test" | "clean" | "benchmarks";

const HANDLERS: Readonly<Record<Verb, OperationHandler>> = {
  build,
  doc: buildDocs,
  test: runTests,
  clean,
  benchmarks: buildBenchmarks,
};

/** Map the CLI argument to a verb; anything unrecognized (or nothing) means build. */
export function parseVerb(arg: string | undefined): Verb {
  switch (arg) {
    case "test":
    case "doc":
    case "clean":
    case "benchmarks":
      return arg;
    default:
      return "build";
  }
}

/** Idempotently create the doc and benchmark output directories. */
export async function scaffoldOutput(paths: ProjectPaths): Promise<void> {
  await fs.mkdir(paths.docs, { recursive: true });
  await fs.mkdir(paths.benches, { recursive: true });
}

export async function dispatch(ctx: BuildContext, arg: string | undefined): Promise<Verb> {
  const verb = parseVerb(arg);
  await scaffoldOutput(ctx.paths);
  logger.debug({ verb, arg }, "Dispatching operation");
  await HANDLERS[verb](ctx);
  return verb;
}

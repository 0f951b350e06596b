import { join, resolve } from "node:path";
import type { ProjectConfig } from "./schema.js";

/** Absolute locations derived from the project root and config. */
export interface ProjectPaths {
  readonly root: string;
  readonly entry: string;
  readonly output: string;
  readonly docs: string;
  readonly benches: string;
  /** Release build output the library-language benchmarks link against. */
  readonly release: string;
}

export function resolveProjectPaths(root: string, config: ProjectConfig): ProjectPaths {
  const output = resolve(root, config.output_dir);
  return {
    root,
    entry: resolve(root, config.library.entry),
    output,
    docs: join(output, "doc"),
    benches: join(output, "benches"),
    release: join(output, "release"),
  };
}

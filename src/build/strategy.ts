import type { Command } from "../types/command.js";

/** What Clean does: run the package tool's clean, or delete the output tree. */
export type CleanAction =
  | { readonly kind: "command"; readonly command: Command }
  | { readonly kind: "remove"; readonly path: string };

/**
 * Tool-specific command construction for every build operation.
 * Selected once per process; handlers express intent through these methods
 * and never re-check which toolchain is present.
 */
export interface BuildStrategy {
  readonly kind: "package-tool" | "direct";
  /** Directory the compiled test binaries land in. */
  readonly testBinaryDir: string;

  build(): Command[];
  docs(): Command[];
  testArtifacts(): Command[];
  /** Test-runner invocations; `binaries` are the artifacts found in testBinaryDir. */
  testRunners(binaries: readonly string[]): Command[];
  clean(): CleanAction;
}

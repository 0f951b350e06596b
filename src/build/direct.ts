import type { Command } from "../types/command.js";
import type { ProjectPaths } from "../config/paths.js";
import type { BuildStrategy, CleanAction } from "./strategy.js";

export interface DirectToolOptions {
  readonly compiler: string;
  readonly docGenerator: string;
  readonly libraryName: string;
  readonly paths: ProjectPaths;
  readonly verbose: boolean;
}

/** Suffix for test binaries so they never collide with the library build output. */
export const TEST_ARTIFACT_SUFFIX = "-no-cargo";

/** Fallback when no package-build tool is installed: compile the entry file directly. */
export class DirectToolStrategy implements BuildStrategy {
  readonly kind = "direct";
  readonly testBinaryDir: string;
  private readonly flags: string[];

  constructor(private readonly options: DirectToolOptions) {
    this.testBinaryDir = options.paths.output;
    this.flags = options.verbose ? ["--verbose"] : [];
  }

  build(): Command[] {
    return [{ argv: [this.options.compiler, ...this.flags, this.options.paths.entry] }];
  }

  docs(): Command[] {
    const { docGenerator, paths, libraryName } = this.options;
    return [{ argv: [docGenerator, ...this.flags, paths.entry, "-o", paths.docs, "--crate-name", libraryName] }];
  }

  testArtifacts(): Command[] {
    const { compiler, paths, libraryName } = this.options;
    return [
      {
        argv: [
          compiler,
          ...this.flags,
          paths.entry,
          "--test",
          "--crate-name",
          libraryName,
          "--out-dir",
          paths.output,
          "-C",
          `extra-filename=${TEST_ARTIFACT_SUFFIX}`,
        ],
      },
    ];
  }

  /** Each built test binary is its own runner. */
  testRunners(binaries: readonly string[]): Command[] {
    return binaries.map((binary) => ({ argv: [binary] }));
  }

  clean(): CleanAction {
    return { kind: "remove", path: this.options.paths.output };
  }
}

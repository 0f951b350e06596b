import { join } from "node:path";
import type { Command } from "../types/command.js";
import type { BuildStrategy, CleanAction } from "./strategy.js";

export interface PackageToolOptions {
  /** Resolved path of the package-build tool. */
  readonly tool: string;
  readonly outputDir: string;
  readonly verbose: boolean;
}

/** Dependency-aware builds through the package-build tool (cargo). */
export class PackageToolStrategy implements BuildStrategy {
  readonly kind = "package-tool";
  readonly testBinaryDir: string;
  private readonly flags: string[];

  constructor(private readonly options: PackageToolOptions) {
    this.testBinaryDir = join(options.outputDir, "debug", "deps");
    this.flags = options.verbose ? ["--verbose"] : [];
  }

  build(): Command[] {
    return [this.cargo("build", ...this.flags, "--release")];
  }

  docs(): Command[] {
    return [this.cargo("doc", ...this.flags)];
  }

  testArtifacts(): Command[] {
    return [this.cargo("test", "--no-run", ...this.flags), this.cargo("bench", "--no-run", ...this.flags)];
  }

  testRunners(): Command[] {
    return [this.cargo("test", ...this.flags)];
  }

  clean(): CleanAction {
    return { kind: "command", command: this.cargo("clean", ...this.flags) };
  }

  private cargo(...args: string[]): Command {
    return { argv: [this.options.tool, ...args] };
  }
}

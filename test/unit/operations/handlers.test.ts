import fs from "fs/promises";
import path from "path";
import os from "os";
import { build } from "../../../src/operations/build.js";
import { buildDocs } from "../../../src/operations/docs.js";
import { buildTestArtifact } from "../../../src/operations/test-artifact.js";
import { clean } from "../../../src/operations/clean.js";
import { buildBenchmarks } from "../../../src/operations/benchmarks.js";
import { BuildErrorCode } from "../../../src/shared/errors.js";
import { FakeExecutor } from "../../helpers/fake-executor.js";
import { makeContext, DIRECT_TOOLCHAIN, LINUX_USER } from "../../helpers/context.js";

describe("operation handlers", () => {
  describe("with the package tool", () => {
    it("build compiles in release mode", async () => {
      const ctx = makeContext();
      await build(ctx);
      expect(ctx.executor.commandLines).toEqual(["/usr/bin/cargo build --release"]);
    });

    it("build widens flags when verbose", async () => {
      const ctx = makeContext({ verbose: true });
      await build(ctx);
      expect(ctx.executor.commandLines).toEqual(["/usr/bin/cargo build --verbose --release"]);
    });

    it("docs use the doc subcommand", async () => {
      const ctx = makeContext({ verbose: true });
      await buildDocs(ctx);
      expect(ctx.executor.commandLines).toEqual(["/usr/bin/cargo doc --verbose"]);
    });

    it("clean uses the clean subcommand", async () => {
      const ctx = makeContext();
      await clean(ctx);
      expect(ctx.executor.commandLines).toEqual(["/usr/bin/cargo clean"]);
    });

    it("surfaces a failing build with its exit status", async () => {
      const ctx = makeContext({ executor: new FakeExecutor(() => ({ exitCode: 101 })) });
      await expect(build(ctx)).rejects.toMatchObject({ code: BuildErrorCode.COMMAND_FAILED, exitCode: 101 });
    });
  });

  describe("without the package tool", () => {
    it("routes build, docs, test artifacts and clean to their fallbacks only", async () => {
      const root = await fs.mkdtemp(path.join(os.tmpdir(), "rawnet-fallback-"));
      const ctx = makeContext({ root, toolchain: DIRECT_TOOLCHAIN });
      const entry = path.join(root, "src", "lib.rs");
      const output = path.join(root, "target");
      await fs.mkdir(output);

      await build(ctx);
      await buildDocs(ctx);
      await buildTestArtifact(ctx);
      await clean(ctx);

      expect(ctx.executor.commandLines).toEqual([
        `/usr/bin/rustc ${entry}`,
        `/usr/bin/rustdoc ${entry} -o ${path.join(output, "doc")} --crate-name rawnet`,
        `/usr/bin/rustc ${entry} --test --crate-name rawnet --out-dir ${output} -C extra-filename=-no-cargo`,
      ]);
      expect(ctx.executor.calls.some((command) => path.basename(command.argv[0]) === "cargo")).toBe(false);
      await expect(fs.access(output)).rejects.toThrow();
      await fs.rm(root, { recursive: true, force: true });
    });

    it("widens the direct compiler and doc generator when verbose", async () => {
      const ctx = makeContext({ toolchain: DIRECT_TOOLCHAIN, verbose: true });
      await build(ctx);
      await buildDocs(ctx);
      expect(ctx.executor.commandLines).toEqual([
        "/usr/bin/rustc --verbose /work/src/lib.rs",
        "/usr/bin/rustdoc --verbose /work/src/lib.rs -o /work/target/doc --crate-name rawnet",
      ]);
    });

    it("clean succeeds when the output directory is already gone", async () => {
      const root = await fs.mkdtemp(path.join(os.tmpdir(), "rawnet-clean-"));
      const ctx = makeContext({ root, toolchain: DIRECT_TOOLCHAIN });

      await expect(clean(ctx)).resolves.toBeUndefined();
      expect(ctx.executor.calls).toHaveLength(0);
      await fs.rm(root, { recursive: true, force: true });
    });
  });

  describe("buildBenchmarks", () => {
    let stderr: string[];

    beforeEach(() => {
      stderr = [];
      jest.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
        stderr.push(String(chunk));
        return true;
      });
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it("compiles native then library-language benchmarks into the benches directory", async () => {
      const ctx = makeContext({ platform: { osName: "Darwin", platformClass: "bsd-darwin", isPrivileged: false } });

      await buildBenchmarks(ctx);

      expect(ctx.executor.commandLines).toEqual([
        "/usr/bin/clang -W -Wall -O2 /work/benches/c_receiver.c -o /work/target/benches/c_receiver",
        "/usr/bin/clang -W -Wall -O2 /work/benches/c_sender.c -o /work/target/benches/c_sender",
        "/usr/bin/rustc -O /work/benches/rs_receiver.rs --out-dir /work/target/benches -L /work/target/release",
        "/usr/bin/rustc -O /work/benches/rs_sender.rs --out-dir /work/target/benches -L /work/target/release",
      ]);
      expect(stderr).toEqual([]);
    });

    it("warns, without failing, off Darwin", async () => {
      const ctx = makeContext({ platform: LINUX_USER });

      await buildBenchmarks(ctx);

      expect(stderr).toEqual(["warning: C benchmarks only work on OS X\n"]);
      expect(ctx.executor.calls).toHaveLength(4);
    });

    it("stops at the first failing benchmark", async () => {
      const executor = new FakeExecutor((command) => (command.argv.includes("/work/benches/c_sender.c") ? { exitCode: 1 } : undefined));
      const ctx = makeContext({ platform: LINUX_USER, executor });

      await expect(buildBenchmarks(ctx)).rejects.toMatchObject({ code: BuildErrorCode.COMMAND_FAILED });
      expect(executor.calls).toHaveLength(2);
    });
  });
});

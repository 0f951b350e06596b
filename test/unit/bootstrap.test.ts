import fs from "fs/promises";
import path from "path";
import os from "os";
import { createBuildContext } from "../../src/bootstrap.js";
import { BuildErrorCode } from "../../src/shared/errors.js";
import { logger } from "../../src/logger.js";
import { FakeExecutor } from "../helpers/fake-executor.js";
import type { Responder } from "../helpers/fake-executor.js";

const DARWIN_HOST: Responder = (command) => {
  switch (command.argv[0]) {
    case "which":
      return command.argv[1] === "cargo" || command.argv[1] === "sudo"
        ? { stdout: `/usr/local/bin/${command.argv[1]}\n` }
        : { exitCode: 1 };
    case "uname":
      return { stdout: "Darwin\n" };
    case "ifconfig":
      return { stdout: "en0: flags=8863<UP,BROADCAST> mtu 1500\n\tstatus: active\n" };
    default:
      return undefined;
  }
};

describe("createBuildContext", () => {
  let root: string;
  let savedLevel: string;

  beforeEach(async () => {
    savedLevel = logger.level;
    root = await fs.mkdtemp(path.join(os.tmpdir(), "rawnet-bootstrap-"));
  });

  afterEach(async () => {
    logger.level = savedLevel;
    await fs.rm(root, { recursive: true, force: true });
  });

  it("discovers toolchain, platform and interface once, before dispatch", async () => {
    const executor = new FakeExecutor(DARWIN_HOST);

    const ctx = await createBuildContext({ cwd: root, env: {}, executor, uid: 501 });

    expect(ctx.toolchain).toEqual({
      packageTool: "/usr/local/bin/cargo",
      compiler: null,
      docGenerator: null,
      cCompiler: null,
      elevation: "/usr/local/bin/sudo",
      hasPackageTool: true,
    });
    expect(ctx.platform).toEqual({ osName: "Darwin", platformClass: "bsd-darwin", isPrivileged: false });
    expect(ctx.interfaceName).toBe("en0");
    expect(ctx.strategy.kind).toBe("package-tool");
    expect(ctx.paths.output).toBe(path.join(root, "target"));
    expect(executor.commandLines.filter((line) => line === "ifconfig")).toHaveLength(1);
  });

  it("preserves a caller-supplied interface instead of recomputing it", async () => {
    const executor = new FakeExecutor(DARWIN_HOST);

    const ctx = await createBuildContext({ cwd: root, env: { RAWNET_TEST_IFACE: "utun3" }, executor, uid: 501 });

    expect(ctx.interfaceName).toBe("utun3");
    expect(executor.commandLines).not.toContain("ifconfig");
  });

  it("selects the direct strategy and verbose widening from the environment", async () => {
    const executor = new FakeExecutor((command) => (command.argv[0] === "which" ? { exitCode: 1 } : { stdout: "Linux\n" }));

    const ctx = await createBuildContext({
      cwd: root,
      env: { VERBOSE: "1", LOG_LEVEL: "silent" },
      executor,
      uid: 1000,
    });

    expect(ctx.settings.verbose).toBe(true);
    expect(logger.level).toBe("silent");
    expect(ctx.strategy.kind).toBe("direct");
    expect(ctx.strategy.build()).toEqual([{ argv: ["rustc", "--verbose", path.join(root, "src", "lib.rs")] }]);
  });

  it("reads the project config from the root", async () => {
    await fs.writeFile(path.join(root, "rawnet-build.yaml"), "library:\n  name: packetlib\noutput_dir: out\n");
    const executor = new FakeExecutor(DARWIN_HOST);

    const ctx = await createBuildContext({ cwd: root, env: {}, executor, uid: 501 });

    expect(ctx.config.library.name).toBe("packetlib");
    expect(ctx.paths.docs).toBe(path.join(root, "out", "doc"));
  });

  it("stops on an invalid config before touching the host", async () => {
    await fs.writeFile(path.join(root, "rawnet-build.yaml"), "output_dir: 42\n");
    const executor = new FakeExecutor(DARWIN_HOST);

    await expect(createBuildContext({ cwd: root, env: {}, executor })).rejects.toMatchObject({
      code: BuildErrorCode.INVALID_CONFIG,
    });
    expect(executor.calls).toHaveLength(0);
  });
});

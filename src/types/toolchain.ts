/** External tools the orchestrator looks for on the search path. */
export type ToolName = "packageTool" | "compiler" | "docGenerator" | "cCompiler" | "elevation";

/**
 * Toolchain availability, resolved once at startup.
 * A null path means the tool was not found; that is a branch condition, not an error.
 */
export interface ToolchainConfig {
  readonly packageTool: string | null;
  readonly compiler: string | null;
  readonly docGenerator: string | null;
  readonly cCompiler: string | null;
  readonly elevation: string | null;
  readonly hasPackageTool: boolean;
}

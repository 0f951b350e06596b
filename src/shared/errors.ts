export enum BuildErrorCode {
  ARTIFACT_BUILD_FAILED = "ARTIFACT_BUILD_FAILED",
  UNSUPPORTED_PLATFORM = "UNSUPPORTED_PLATFORM",
  COMMAND_FAILED = "COMMAND_FAILED",
  INVALID_CONFIG = "INVALID_CONFIG",
}

export class BuildError extends Error {
  readonly code: BuildErrorCode;
  /** Status the CLI exits with when this error ends the run. */
  readonly exitCode: number;
  readonly context?: Record<string, unknown>;

  constructor(code: BuildErrorCode, message: string, exitCode = 1, context?: Record<string, unknown>) {
    super(message);
    this.name = "BuildError";
    this.code = code;
    this.exitCode = exitCode;
    this.context = context;
  }
}

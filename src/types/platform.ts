/** OS families treated distinctly for privilege purposes. */
export type PlatformClass = "linux" | "bsd-darwin" | "windows-compat" | "unsupported";

/** Host platform facts, derived once per process. */
export interface PlatformInfo {
  /** Name as reported by `uname -s` (e.g. "Linux", "Darwin", "MINGW64_NT-10.0"). */
  readonly osName: string;
  readonly platformClass: PlatformClass;
  /** True when the process already runs as uid 0. */
  readonly isPrivileged: boolean;
}

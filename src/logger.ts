import pino from "pino";

// Structured log goes to stderr so it never interleaves with tool output on stdout.
export const logger = pino(
  {
    name: "rawnet-build",
    level: process.env.LOG_LEVEL ?? "warn",
  },
  pino.destination(2),
);

/** Print an operator-facing line (advisories, command trace). */
export function announce(message: string): void {
  process.stderr.write(`${message}\n`);
}

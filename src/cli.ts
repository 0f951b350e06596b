#!/usr/bin/env node

import { createBuildContext } from "./bootstrap.js";
import { dispatch } from "./operations/dispatcher.js";
import { BuildError } from "./shared/errors.js";
import { announce, logger } from "./logger.js";

async function main(argv: string[]): Promise<number> {
  try {
    const ctx = await createBuildContext({ cwd: process.cwd(), env: process.env });
    const verb = await dispatch(ctx, argv[2]);
    logger.debug({ verb }, "Operation complete");
    return 0;
  } catch (err) {
    if (err instanceof BuildError) {
      logger.error({ code: err.code, context: err.context }, err.message);
      announce(`error: ${err.message}`);
      return err.exitCode;
    }
    throw err;
  }
}

main(process.argv).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (err: unknown) => {
    logger.fatal({ error: err }, "Unexpected failure");
    announce(`fatal: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  },
);

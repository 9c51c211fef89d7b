#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { env } from "./config/environment.js";
import { logger } from "./config/logger.js";
import { createRuntime } from "./runtime.js";
import { errorMessage } from "./utils/errors.js";

const program = createProgram({
  createRuntime: () => createRuntime(env, logger),
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`Command failed: ${errorMessage(error)}\n`);
  process.exit(1);
});

#!/usr/bin/env node

import { createProgram } from "./cli.js";
import { describeError } from "./errors.js";
import { run } from "./run.js";

createProgram((options) => run(options))
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`error: ${describeError(err)}`);
    process.exitCode = 1;
  });

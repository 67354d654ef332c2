#!/usr/bin/env node
import { buildProgram } from "./cli.js";
import { formatErrorMessage } from "./errors.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(formatErrorMessage(err));
    process.exitCode = 1;
  });

#!/usr/bin/env node

import chalk from "chalk";
import { CommanderError } from "commander";
import { ExitCode } from "../operations/types";
import { createProgram } from "./index";

void createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof CommanderError) {
      // usage errors are configuration errors; --help and --version exit 0
      process.exitCode = error.exitCode === 0 ? ExitCode.OK : ExitCode.CONFIGURATION;
      return;
    }
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    if (process.env.DEBUG !== undefined && error instanceof Error) {
      console.error(chalk.dim(error.stack));
    }
    process.exitCode = ExitCode.FAILURES;
  });

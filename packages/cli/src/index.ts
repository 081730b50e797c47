#!/usr/bin/env node

import chalk from "chalk";
import { CommanderError } from "commander";
import { loadRuntimeConfig, toErrorMessage } from "@vmforge/core";
import type { LogLevel, RuntimeConfig } from "@vmforge/core";
import { createProvisioningContext } from "@vmforge/cloud-providers";
import { createProgram } from "./program";
import { ConsoleOutputService } from "./services/console-output.service";

// Service logs share stdout with command output; keep them quiet unless asked.
const CLI_DEFAULT_LOG_LEVEL: LogLevel = "warn";

const runtimeConfig = loadRuntimeConfig();
const config: RuntimeConfig = process.env.VMFORGE_LOG_LEVEL
  ? runtimeConfig
  : { ...runtimeConfig, logLevel: CLI_DEFAULT_LOG_LEVEL };

const program = createProgram(createProvisioningContext({ config }), new ConsoleOutputService());

// Commander has already printed its own message (usage, missing option).
try {
  program.parse();
} catch (error: unknown) {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
  } else {
    console.error(chalk.red("Error:"), toErrorMessage(error));
    process.exitCode = 1;
  }
}

#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { VERSION, errorMessage } from "@fanwise/core";

import { runCommand } from "./run.js";
import { qtableCommand } from "./qtable.js";
import { reportCommand } from "./report.js";

const program = new Command();

program
    .name("fanwise")
    .description("Adaptive Q-learning fan control for a radiator and NVMe storage")
    .version(VERSION);

program.addCommand(runCommand);
program.addCommand(qtableCommand);
program.addCommand(reportCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(chalk.red(`\nFatal error: ${errorMessage(err)}`));
    process.exit(1);
});

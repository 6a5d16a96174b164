#!/usr/bin/env node
import chalk from "chalk";
import { Command } from "commander";
import { registerDeployAction } from "./commands/deploy";
import { registerDoctorCommand } from "./commands/doctor";
import { registerStatusCommand } from "./commands/status";
import { CLI_NAME } from "./lib/constants";
import { renderCliError, toCliError } from "./lib/errors";
import { readPackageMeta } from "./lib/package";

const pkg = readPackageMeta();
const program = new Command().enablePositionalOptions();
const normalizedArgv = process.argv.map((arg) => (arg === "-v" ? "--version" : arg));

program
  .name(CLI_NAME)
  .description(pkg.description ?? "Deploy a Dockerized app to a remote host behind nginx")
  .version(pkg.version ?? "0.0.0", "--version", "output the version number");

registerDeployAction(program);
registerStatusCommand(program);
registerDoctorCommand(program);

program.parseAsync(normalizedArgv).catch((error: unknown) => {
  const cliError = toCliError(error);
  console.error(chalk.red(renderCliError(cliError)));
  process.exitCode = cliError.exitCode;
});

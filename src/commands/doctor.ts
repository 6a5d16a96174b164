import chalk from "chalk";
import { Command } from "commander";
import { resolveConfig } from "../lib/config";
import { createConnectivityChecker } from "../lib/connectivity";
import { CLI_NAME } from "../lib/constants";
import { CliError } from "../lib/errors";
import { runPreflight, runRemotePreflight, type PreflightCheck } from "../lib/preflight";
import { promptConnection } from "../lib/prompts";
import { createSshSessionFactory, type SshOptions } from "../lib/ssh";

interface DoctorOptions {
  user?: string;
  host?: string;
  key?: string;
}

function printChecks(title: string, checks: PreflightCheck[], suggestedCommands: Set<string>): void {
  console.log(chalk.bold(title));
  for (const check of checks) {
    const symbol = !check.ok ? chalk.red("✖") : check.fix ? chalk.yellow("!") : chalk.green("✔");
    console.log(`${symbol} ${check.message}`);
    if (check.fix) {
      console.log(`  fix: ${check.fix}`);
    }
    for (const command of check.suggestedCommands ?? []) {
      console.log(`  please run: ${chalk.bold(command)}`);
      if (!check.ok) {
        suggestedCommands.add(command);
      }
    }
  }
}

export function registerDoctorCommand(program: Command): void {
  program
    .command("doctor")
    .description("Check the local tools and, with --host, the remote host a deployment needs")
    .option("--user <name>", "SSH username")
    .option("--host <ip>", "Server IPv4 address")
    .option("--key <path>", "Path to the SSH private key")
    .action(async (options: DoctorOptions) => {
      const suggestedCommands = new Set<string>();
      const local = await runPreflight();
      printChecks("Local", local.checks, suggestedCommands);
      let ok = local.ok;

      if (options.host) {
        const connection = await promptConnection(options);
        const config = resolveConfig();
        const sshOptions: SshOptions = {
          connectTimeoutSeconds: config.connectTimeoutSeconds,
          hostKeyPolicy: config.hostKeyPolicy
        };
        const remote = await runRemotePreflight(connection, {
          connectivity: createConnectivityChecker(sshOptions),
          openSession: createSshSessionFactory(sshOptions)
        });
        console.log("");
        printChecks("Remote", remote, suggestedCommands);
        ok = ok && remote.every((check) => check.ok);
      }

      if (!ok) {
        if (suggestedCommands.size > 0) {
          console.log("");
          console.log(chalk.yellow(`Action required: run the command(s) above, then re-run \`${CLI_NAME} doctor\`.`));
        }
        throw new CliError({ kind: "local", message: "Preflight failed." });
      }
    });
}

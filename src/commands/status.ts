import chalk from "chalk";
import { Command } from "commander";
import { getCommandContext, openCommandLog, reportOutcome, settleCommand } from "../lib/command-context";
import { describeHostState } from "../lib/orchestrator";
import { promptConnection } from "../lib/prompts";
import type { HostState } from "../lib/types";

interface StatusOptions {
  user?: string;
  host?: string;
  key?: string;
}

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Inspect the remote host without changing it")
    .option("--user <name>", "SSH username")
    .option("--host <ip>", "Server IPv4 address")
    .option("--key <path>", "Path to the SSH private key")
    .action(async (options: StatusOptions) => {
      const { log, logPath } = openCommandLog();
      const outcome = await settleCommand(log, "Status", async () => {
        const connection = await promptConnection(options);
        const { config, orchestrator } = getCommandContext(log);
        const state = await orchestrator.inspect(connection, {
          containerName: config.containerName,
          imageName: config.imageName,
          hostPort: 0,
          containerPort: config.containerPort,
          proxySiteName: config.proxySiteName,
          proxyServerName: config.proxyServerName
        });
        log.info(`Host state: ${describeHostState(state)}`);

        console.log(`host: ${connection.user}@${connection.host}`);
        for (const line of renderHostState(state, config.containerName, config.imageName, config.proxySiteName)) {
          console.log(line);
        }
        return { exitCode: 0, message: `Inspected ${connection.user}@${connection.host}.` };
      });
      reportOutcome(outcome, logPath);
    });
}

export function renderHostState(state: HostState, containerName: string, imageName: string, site: string): string[] {
  const mark = (ok: boolean) => (ok ? chalk.green("✔") : chalk.dim("-"));
  const containerLabel = state.containerExists ? (state.containerRunning ? "running" : "stopped") : "absent";
  return [
    `${mark(state.containerRunning)} container ${containerName}: ${containerLabel}`,
    `${mark(state.imageExists)} image ${imageName}: ${state.imageExists ? "present" : "absent"}`,
    `${mark(state.proxySiteFileExists)} proxy site file ${site}: ${state.proxySiteFileExists ? "present" : "absent"}`,
    `${mark(state.proxySiteLinked)} proxy site ${site}: ${state.proxySiteLinked ? "enabled" : "disabled"}`,
    `${mark(!state.defaultSiteLinked)} default site: ${state.defaultSiteLinked ? "enabled" : "disabled"}`
  ];
}

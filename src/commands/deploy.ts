import path from "node:path";
import chalk from "chalk";
import { Command } from "commander";
import { getCommandContext, openCommandLog, reportOutcome, settleCommand } from "../lib/command-context";
import type { DeployParams } from "../lib/orchestrator";
import { promptAppPort, promptConnection, promptSource } from "../lib/prompts";
import { normalizeInputPath } from "../lib/utils";
import { runCleanup } from "./cleanup";
import { toConfigOverrides, type DeployOptions } from "./options";

export function registerDeployAction(program: Command): void {
  program
    .option("--cleanup", "Remove all containers, images and proxy config from the remote host")
    .option("--repo <url>", "Git repository URL (https, ending in .git)")
    .option("--branch <name>", "Branch to deploy (default: main)")
    .option("--user <name>", "SSH username")
    .option("--host <ip>", "Server IPv4 address")
    .option("--key <path>", "Path to the SSH private key")
    .option("--port <port>", "Host port the container is published on")
    .option("--container-port <port>", "Port the application listens on inside the container")
    .option("--server-name <name>", "nginx server_name for the proxy site")
    .option("--site <name>", "nginx site file name")
    .option("--remote-dir <dir>", "Remote directory files are copied to")
    .option("--context <dir>", "Build context inside the remote directory")
    .option("--include <items...>", "Only copy these top-level files or directories")
    .option("--work-dir <dir>", "Local directory to clone into, or the project itself with --local")
    .option("--local", "Deploy the working directory as-is without fetching from git")
    .option("--log-dir <dir>", "Directory for the deployment log")
    .action(async (options: DeployOptions) => {
      if (options.cleanup) {
        await runCleanup(options);
        return;
      }

      const { log, logPath } = openCommandLog(options.logDir);
      const outcome = await settleCommand(log, "Deployment", async () => {
        const overrides = toConfigOverrides(options);
        const source = options.local ? undefined : await promptSource(options);
        const connection = await promptConnection(options);
        const hostPort = await promptAppPort(options.port);

        const { config, orchestrator } = getCommandContext(log, overrides);
        if (source) {
          log.info(`Repository ${source.repoUrl}, branch ${source.branch}`);
        }
        log.info(`Target ${connection.user}@${connection.host}, port ${hostPort}`);

        const params: DeployParams = {
          connection,
          target: {
            containerName: config.containerName,
            imageName: config.imageName,
            hostPort,
            containerPort: config.containerPort,
            proxySiteName: config.proxySiteName,
            proxyServerName: config.proxyServerName
          },
          workDir: path.resolve(normalizeInputPath(options.workDir ?? ".")),
          source,
          remoteDir: config.remoteDir,
          buildContext: options.context,
          include: options.include
        };

        console.log(chalk.cyan("Deploy summary"));
        console.log(`  Source: ${source ? `${source.repoUrl} (${source.branch})` : params.workDir}`);
        console.log(`  Host: ${connection.user}@${connection.host}`);
        console.log(`  Container: ${params.target.containerName} on ${hostPort}:${params.target.containerPort}`);
        console.log(`  Proxy site: ${params.target.proxySiteName} (server_name ${params.target.proxyServerName})`);

        return await orchestrator.run(params);
      });
      reportOutcome(outcome, logPath);
    });
}

import chalk from "chalk";
import { resolveConfig, resolveLogDir, type ConfigOverrides, type DeployConfig } from "./config";
import { createConnectivityChecker } from "./connectivity";
import { openDeployLog, type DeployLog } from "./deploy-log";
import { renderCliError } from "./errors";
import { DeploymentOrchestrator, failureOutcome, type RunOutcome } from "./orchestrator";
import { createSpinnerReporter } from "./progress";
import { syncSource } from "./source";
import { createSshSessionFactory, type SshOptions } from "./ssh";

export interface CommandLog {
  log: DeployLog;
  logPath: string;
}

export interface CommandContext {
  config: DeployConfig;
  orchestrator: DeploymentOrchestrator;
}

/** Opened before any parameter is read so that invalid input is logged too. */
export function openCommandLog(logDir?: string): CommandLog {
  const { log, filePath } = openDeployLog(resolveLogDir(process.env, logDir), { echo: true });
  return { log, logPath: filePath };
}

export function getCommandContext(log: DeployLog, overrides: ConfigOverrides = {}): CommandContext {
  const config = resolveConfig(process.env, overrides);

  const sshOptions: SshOptions = {
    connectTimeoutSeconds: config.connectTimeoutSeconds,
    hostKeyPolicy: config.hostKeyPolicy,
    log
  };
  const orchestrator = new DeploymentOrchestrator({
    log,
    openSession: createSshSessionFactory(sshOptions),
    connectivity: createConnectivityChecker(sshOptions),
    syncSource: (source, baseDir) => syncSource(source, baseDir, { log }),
    progress: process.stdout.isTTY ? createSpinnerReporter() : undefined
  });

  return { config, orchestrator };
}

/**
 * Runs a command body whose parameter handling may still throw. Anything that
 * escapes is logged and mapped to an exit status like an orchestrator failure.
 */
export async function settleCommand(log: DeployLog, label: string, fn: () => Promise<RunOutcome>): Promise<RunOutcome> {
  try {
    return await fn();
  } catch (error) {
    return failureOutcome(log, label, error);
  }
}

export function reportOutcome(outcome: RunOutcome, logPath: string): void {
  if (outcome.exitCode === 0) {
    console.log(chalk.green(`✔ ${outcome.message}`));
  } else if (outcome.error) {
    console.error(chalk.red(renderCliError(outcome.error)));
  } else {
    console.error(chalk.red(outcome.message));
  }
  console.log(chalk.dim(`Log: ${logPath}`));
  process.exitCode = outcome.exitCode;
}

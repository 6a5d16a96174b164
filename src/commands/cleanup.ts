import chalk from "chalk";
import { getCommandContext, openCommandLog, reportOutcome, settleCommand } from "../lib/command-context";
import { promptConnection } from "../lib/prompts";
import { toConfigOverrides, type DeployOptions } from "./options";

/** Host-wide teardown; only the connection parameters are needed. */
export async function runCleanup(options: DeployOptions): Promise<void> {
  console.log(chalk.yellow("Running in cleanup mode: every container and image on the host will be removed."));
  const { log, logPath } = openCommandLog(options.logDir);
  const outcome = await settleCommand(log, "Cleanup", async () => {
    const overrides = toConfigOverrides(options);
    const connection = await promptConnection(options);
    const { config, orchestrator } = getCommandContext(log, overrides);
    return await orchestrator.runTeardown(connection, config.proxySiteName);
  });
  reportOutcome(outcome, logPath);
}

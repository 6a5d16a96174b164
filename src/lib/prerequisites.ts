import type { DeployLog } from "./deploy-log";
import { CliError } from "./errors";
import type { RemoteShell } from "./ssh";
import { firstLine, shellQuote } from "./utils";

export interface Prerequisite {
  command: string;
  aptPackage: string;
  service: string;
}

export const REMOTE_PREREQUISITES: readonly Prerequisite[] = [
  { command: "docker", aptPackage: "docker.io", service: "docker" },
  { command: "nginx", aptPackage: "nginx", service: "nginx" }
];

export function installScript(prerequisite: Prerequisite): string {
  return [
    "sudo apt-get update -y",
    `sudo DEBIAN_FRONTEND=noninteractive apt-get install -y ${shellQuote(prerequisite.aptPackage)}`,
    `sudo systemctl enable --now ${shellQuote(prerequisite.service)}`
  ].join(" && ");
}

export interface PrerequisiteStatus {
  prerequisite: Prerequisite;
  installed: boolean;
}

async function isInstalled(shell: RemoteShell, prerequisite: Prerequisite): Promise<boolean> {
  const probe = await shell.exec(`command -v ${shellQuote(prerequisite.command)}`);
  return probe.exitCode === 0;
}

/** Read-only check of which prerequisites the host already has. */
export async function probePrerequisites(
  shell: RemoteShell,
  prerequisites: readonly Prerequisite[] = REMOTE_PREREQUISITES
): Promise<PrerequisiteStatus[]> {
  const statuses: PrerequisiteStatus[] = [];
  for (const prerequisite of prerequisites) {
    statuses.push({ prerequisite, installed: await isInstalled(shell, prerequisite) });
  }
  return statuses;
}

/** Installs whatever is missing; returns the names of installed tools. */
export async function ensurePrerequisites(
  shell: RemoteShell,
  log?: DeployLog,
  prerequisites: readonly Prerequisite[] = REMOTE_PREREQUISITES
): Promise<string[]> {
  const installed: string[] = [];
  for (const prerequisite of prerequisites) {
    if (await isInstalled(shell, prerequisite)) {
      log?.info(`${prerequisite.command} already installed`);
      continue;
    }

    log?.info(`Installing ${prerequisite.aptPackage}`);
    const result = await shell.exec(installScript(prerequisite));
    if (result.exitCode !== 0) {
      throw new CliError({
        kind: "provision",
        message: `Failed to install ${prerequisite.aptPackage} on the remote host.`,
        hint: "The remote host needs apt-get and passwordless sudo.",
        detail: firstLine(result.stderr) || undefined
      });
    }
    installed.push(prerequisite.command);
  }
  return installed;
}

import type { ConnectivityChecker } from "./connectivity";
import { runCommand, type CommandRunner } from "./exec";
import { probePrerequisites, REMOTE_PREREQUISITES, type Prerequisite } from "./prerequisites";
import { sshDestination, withSession, type SessionFactory } from "./ssh";
import type { SshConnection } from "./types";

export interface PreflightCheck {
  key: string;
  ok: boolean;
  message: string;
  fix?: string;
  suggestedCommands?: string[];
}

export interface PreflightReport {
  checks: PreflightCheck[];
  ok: boolean;
}

interface LocalTool {
  binary: string;
  purpose: string;
  aptPackage: string;
  required: boolean;
}

export const LOCAL_TOOLS: readonly LocalTool[] = [
  { binary: "ssh", purpose: "remote commands", aptPackage: "openssh-client", required: true },
  { binary: "scp", purpose: "file transfer", aptPackage: "openssh-client", required: true },
  { binary: "git", purpose: "fetching the repository", aptPackage: "git", required: true },
  { binary: "ping", purpose: "the reachability check", aptPackage: "iputils-ping", required: false }
];

export const MIN_NODE_MAJOR = 20;

export async function resolveBinary(binary: string, runner: CommandRunner = runCommand): Promise<string | null> {
  try {
    const result = await runner("which", [binary], { allowNonZeroExit: true, timeoutMs: 5000 });
    const resolved = result.exitCode === 0 ? result.stdout.split("\n")[0].trim() : "";
    return resolved || null;
  } catch {
    return null;
  }
}

export async function runPreflight(runner: CommandRunner = runCommand, nodeVersion = process.versions.node): Promise<PreflightReport> {
  const checks: PreflightCheck[] = [];

  const nodeMajor = Number(nodeVersion.split(".")[0] ?? "0");
  const nodeOk = Number.isFinite(nodeMajor) && nodeMajor >= MIN_NODE_MAJOR;
  checks.push({
    key: "node",
    ok: nodeOk,
    message: `Node.js v${nodeVersion}`,
    fix: nodeOk ? undefined : `Install Node.js ${MIN_NODE_MAJOR} or newer.`
  });

  for (const tool of LOCAL_TOOLS) {
    const resolved = await resolveBinary(tool.binary, runner);
    if (resolved) {
      checks.push({ key: tool.binary, ok: true, message: `${tool.binary} found at ${resolved}` });
      continue;
    }
    checks.push({
      key: tool.binary,
      // ping is optional: deployments proceed when ICMP is unavailable.
      ok: !tool.required,
      message: `${tool.binary} not found (needed for ${tool.purpose})`,
      fix: `Install ${tool.aptPackage}.`,
      suggestedCommands: [`sudo apt-get install -y ${tool.aptPackage}`]
    });
  }

  return { checks, ok: checks.every((check) => check.ok) };
}

export interface RemotePreflightDeps {
  connectivity: ConnectivityChecker;
  openSession: SessionFactory;
}

/**
 * Checks the control channel and the remote prerequisites without changing
 * the host. Missing docker or nginx is not a failure: deploy installs them.
 */
export async function runRemotePreflight(
  connection: SshConnection,
  deps: RemotePreflightDeps,
  prerequisites: readonly Prerequisite[] = REMOTE_PREREQUISITES
): Promise<PreflightCheck[]> {
  const destination = sshDestination(connection);
  if (!(await deps.connectivity.probe(connection))) {
    return [{
      key: "ssh-connection",
      ok: false,
      message: `SSH connection to ${destination} failed`,
      fix: "Check the host address, the username and that the key is authorized on the server."
    }];
  }

  const statuses = await withSession(deps.openSession, connection, (session) => probePrerequisites(session, prerequisites));
  return [
    { key: "ssh-connection", ok: true, message: `SSH connection to ${destination} works` },
    ...statuses.map(({ prerequisite, installed }): PreflightCheck => ({
      key: `remote-${prerequisite.command}`,
      ok: true,
      message: `${prerequisite.command} ${installed ? "installed" : "missing"} on ${connection.host}`,
      fix: installed ? undefined : `Deploy installs ${prerequisite.aptPackage} on its first run.`
    }))
  ];
}

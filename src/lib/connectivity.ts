import { DEFAULT_CONNECT_TIMEOUT_SECONDS, PING_COUNT } from "./constants";
import { runCommand, type CommandRunner } from "./exec";
import { sshBaseArgs, sshDestination, type SshOptions } from "./ssh";
import type { SshConnection } from "./types";

export interface ConnectivityChecker {
  ping(host: string): Promise<boolean>;
  probe(connection: SshConnection): Promise<boolean>;
}

export async function pingHost(host: string, runner: CommandRunner = runCommand): Promise<boolean> {
  try {
    const result = await runner("ping", ["-c", String(PING_COUNT), host], {
      allowNonZeroExit: true,
      timeoutMs: 15_000
    });
    return result.exitCode === 0;
  } catch {
    return false;
  }
}

/** Runs `true` over a non-interactive SSH connection. */
export async function probeControlChannel(connection: SshConnection, options: SshOptions = {}): Promise<boolean> {
  const runner = options.runner ?? runCommand;
  const connectTimeoutSeconds = options.connectTimeoutSeconds ?? DEFAULT_CONNECT_TIMEOUT_SECONDS;
  try {
    const result = await runner("ssh", [...sshBaseArgs(connection, options), sshDestination(connection), "true"], {
      allowNonZeroExit: true,
      timeoutMs: (connectTimeoutSeconds + 10) * 1000
    });
    return result.exitCode === 0;
  } catch {
    return false;
  }
}

export function createConnectivityChecker(options: SshOptions = {}): ConnectivityChecker {
  const runner = options.runner ?? runCommand;
  return {
    ping: (host) => pingHost(host, runner),
    probe: (connection) => probeControlChannel(connection, options)
  };
}

import { DEFAULT_CONNECT_TIMEOUT_SECONDS } from "./constants";
import type { DeployLog } from "./deploy-log";
import { runCommand, type CommandRunner, type RunResult } from "./exec";
import type { SshConnection, StepOutcome } from "./types";
import { firstLine, normalizeInputPath } from "./utils";

export type HostKeyPolicy = "accept-new" | "yes" | "no";

export interface RemoteExecOptions {
  input?: string;
  /** Zero (the default) waits as long as the command runs. */
  timeoutMs?: number;
}

/** Command execution against the remote host. Exit codes are returned, never thrown. */
export interface RemoteShell {
  exec(script: string, options?: RemoteExecOptions): Promise<RunResult>;
}

export interface RemoteSession extends RemoteShell {
  copy(localPath: string, remoteDir: string): Promise<StepOutcome>;
  close(): Promise<void>;
}

export type SessionFactory = (connection: SshConnection) => Promise<RemoteSession>;

export interface SshOptions {
  connectTimeoutSeconds?: number;
  hostKeyPolicy?: HostKeyPolicy;
  runner?: CommandRunner;
  log?: DeployLog;
}

export function sshDestination(connection: SshConnection): string {
  return `${connection.user}@${connection.host}`;
}

export function sshBaseArgs(connection: SshConnection, options: SshOptions = {}): string[] {
  return [
    "-i",
    normalizeInputPath(connection.keyPath),
    "-o",
    "BatchMode=yes",
    "-o",
    `ConnectTimeout=${options.connectTimeoutSeconds ?? DEFAULT_CONNECT_TIMEOUT_SECONDS}`,
    "-o",
    `StrictHostKeyChecking=${options.hostKeyPolicy ?? "accept-new"}`
  ];
}

/**
 * One phase's view of the control channel. Commands run one at a time through
 * `ssh`; files are copied with `scp` using the same identity and options.
 */
export class SshSession implements RemoteSession {
  private readonly connection: SshConnection;
  private readonly options: SshOptions;
  private readonly runner: CommandRunner;
  private closed = false;

  constructor(connection: SshConnection, options: SshOptions = {}) {
    this.connection = connection;
    this.options = options;
    this.runner = options.runner ?? runCommand;
  }

  async exec(script: string, options: RemoteExecOptions = {}): Promise<RunResult> {
    this.assertOpen();
    const log = this.options.log;
    log?.info(`remote$ ${script}`);
    return await this.runner(
      "ssh",
      [...sshBaseArgs(this.connection, this.options), sshDestination(this.connection), script],
      {
        allowNonZeroExit: true,
        input: options.input,
        timeoutMs: options.timeoutMs ?? 0,
        onOutput: log ? (chunk) => log.output(chunk) : undefined
      }
    );
  }

  async copy(localPath: string, remoteDir: string): Promise<StepOutcome> {
    this.assertOpen();
    const result = await this.runner(
      "scp",
      ["-r", ...sshBaseArgs(this.connection, this.options), localPath, `${sshDestination(this.connection)}:${remoteDir}/`],
      { allowNonZeroExit: true, timeoutMs: 0 }
    );
    if (result.exitCode === 0) {
      return { ok: true };
    }
    return { ok: false, detail: firstLine(result.stderr) || `scp exited with ${result.exitCode}` };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`SSH session to ${sshDestination(this.connection)} is already closed.`);
    }
  }
}

export function createSshSessionFactory(options: SshOptions = {}): SessionFactory {
  return async (connection) => new SshSession(connection, options);
}

/** Opens a session for one phase and always releases it. */
export async function withSession<T>(
  openSession: SessionFactory,
  connection: SshConnection,
  fn: (session: RemoteSession) => Promise<T>
): Promise<T> {
  const session = await openSession(connection);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}

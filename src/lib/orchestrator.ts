import { ActionExecutor } from "./actions";
import type { ConnectivityChecker } from "./connectivity";
import { DockerRuntime, type ContainerRuntime } from "./container-runtime";
import { ConvergenceEngine } from "./convergence";
import type { DeployLog } from "./deploy-log";
import { CliError, toCliError } from "./errors";
import { RemoteInspector } from "./inspector";
import { collectErrors, validateHost, validateKeyPath, validateSshUser } from "./params";
import { ensurePrerequisites } from "./prerequisites";
import type { ProgressReporter } from "./progress";
import { NginxProxy, type ProxyService } from "./proxy";
import type { SourceSpec } from "./source";
import { withSession, type RemoteShell, type SessionFactory } from "./ssh";
import { TeardownEngine } from "./teardown";
import type { DeploymentResult, DeploymentTarget, HostState, SshConnection } from "./types";
import { hasBuildDescriptor, listTransferItems, resolveRemoteBuildPath, transferFiles } from "./workspace";

export interface DeployParams {
  connection: SshConnection;
  target: DeploymentTarget;
  /** Project directory, or the parent of the checkout when `source` is set. */
  workDir: string;
  source?: SourceSpec;
  remoteDir: string;
  buildContext?: string;
  include?: string[];
}

export interface OrchestratorDeps {
  log: DeployLog;
  openSession: SessionFactory;
  connectivity: ConnectivityChecker;
  syncSource?: (source: SourceSpec, baseDir: string) => Promise<string>;
  createRuntime?: (shell: RemoteShell) => ContainerRuntime;
  createProxy?: (shell: RemoteShell) => ProxyService;
  provision?: (shell: RemoteShell, log: DeployLog) => Promise<string[]>;
  progress?: ProgressReporter;
}

export interface RunOutcome {
  exitCode: number;
  message: string;
  result?: DeploymentResult;
  error?: CliError;
}

/**
 * Drives one deployment or teardown from local checks to the remote state
 * machines. Every failure is turned into an exit status here and nowhere else.
 */
export class DeploymentOrchestrator {
  private readonly deps: OrchestratorDeps;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
  }

  async run(params: DeployParams): Promise<RunOutcome> {
    return await this.settle("Deployment", () => this.deploy(params));
  }

  async runTeardown(connection: SshConnection, proxySiteName: string): Promise<RunOutcome> {
    return await this.settle("Cleanup", () => this.teardown(connection, proxySiteName));
  }

  async inspect(connection: SshConnection, target: DeploymentTarget): Promise<HostState> {
    await this.requireControlChannel(connection);
    return await this.phase("Inspecting remote host", () =>
      withSession(this.deps.openSession, connection, (session) => this.inspector(session).inspect(target))
    );
  }

  private async settle(label: string, fn: () => Promise<DeploymentResult>): Promise<RunOutcome> {
    const { log } = this.deps;
    try {
      const result = await fn();
      log.info(`${label} succeeded: ${result.message}`);
      return { exitCode: 0, message: result.message, result };
    } catch (error) {
      return failureOutcome(log, label, error);
    }
  }

  private async deploy(params: DeployParams): Promise<DeploymentResult> {
    const { log } = this.deps;
    this.validateConnection(params.connection);

    let projectDir = params.workDir;
    const source = params.source;
    const syncSource = this.deps.syncSource;
    if (source && syncSource) {
      projectDir = await this.phase("Fetching source", () => syncSource(source, params.workDir));
    }

    if (!hasBuildDescriptor(projectDir)) {
      throw new CliError({
        kind: "local",
        message: `No Dockerfile found in ${projectDir}.`,
        hint: "The project must contain a Dockerfile at its root."
      });
    }
    log.info(`Found Dockerfile in ${projectDir}`);

    await this.requireControlChannel(params.connection);

    const remoteDir = params.remoteDir;
    const items = listTransferItems(projectDir, params.include);
    await this.phase("Copying files", () =>
      withSession(this.deps.openSession, params.connection, async (session) => {
        const report = await transferFiles(session, projectDir, items, remoteDir, log);
        log.info(`Copied ${report.copied.length} of ${items.length} item(s) to ${remoteDir}`);
      })
    );

    await this.phase("Installing prerequisites", () =>
      withSession(this.deps.openSession, params.connection, (session) => this.provision(session))
    );

    const state = await this.phase("Inspecting remote host", () =>
      withSession(this.deps.openSession, params.connection, (session) => this.inspector(session).inspect(params.target))
    );
    log.info(`Host state: ${describeHostState(state)}`);

    const buildPath = resolveRemoteBuildPath(remoteDir, params.buildContext);
    const result = await this.phase("Deploying container", () =>
      withSession(this.deps.openSession, params.connection, (session) =>
        new ConvergenceEngine(this.executor(session), log).converge(state, params.target, buildPath)
      )
    );

    if (!result.succeeded) {
      const kind = result.failureKind ?? "runtime";
      throw new CliError({
        kind,
        message: result.message,
        hint: kind === "remote_build"
          ? "The previous container and image were already removed; nothing is serving until the next successful deploy."
          : undefined
      });
    }
    return result;
  }

  private async teardown(connection: SshConnection, proxySiteName: string): Promise<DeploymentResult> {
    this.validateConnection(connection);
    await this.requireControlChannel(connection);
    return await this.phase("Removing containers, images and proxy config", () =>
      withSession(this.deps.openSession, connection, (session) => {
        const runtime = this.runtime(session);
        return new TeardownEngine(runtime, this.executor(session), this.deps.log).teardown(proxySiteName);
      })
    );
  }

  private validateConnection(connection: SshConnection): void {
    const errors = collectErrors([
      validateSshUser(connection.user),
      validateHost(connection.host),
      validateKeyPath(connection.keyPath)
    ]);
    if (errors.length > 0) {
      throw new CliError({ kind: "validation", message: "Invalid connection parameters.", detail: errors.join("\n") });
    }
  }

  private async requireControlChannel(connection: SshConnection): Promise<void> {
    const { log, connectivity } = this.deps;
    log.info(`Testing connectivity to ${connection.host}`);
    if (await connectivity.ping(connection.host)) {
      log.info("Ping successful");
    } else {
      log.warn(`Cannot ping ${connection.host}; ICMP may be blocked, trying SSH`);
    }

    if (!(await connectivity.probe(connection))) {
      throw new CliError({
        kind: "connectivity",
        message: `SSH connection to ${connection.user}@${connection.host} failed.`,
        hint: "Check the host address, the username and that the key is authorized on the server."
      });
    }
    log.info("SSH connection test successful");
  }

  private async provision(shell: RemoteShell): Promise<void> {
    const provision = this.deps.provision ?? ensurePrerequisites;
    const installed = await provision(shell, this.deps.log);
    if (installed.length > 0) {
      this.deps.log.info(`Installed ${installed.join(", ")}`);
    }
  }

  private async phase<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const { log, progress } = this.deps;
    log.info(label);
    progress?.start(label);
    try {
      const value = await fn();
      progress?.succeed(label);
      return value;
    } catch (error) {
      progress?.fail(label);
      throw error;
    }
  }

  private runtime(shell: RemoteShell): ContainerRuntime {
    return this.deps.createRuntime ? this.deps.createRuntime(shell) : new DockerRuntime(shell);
  }

  private proxy(shell: RemoteShell): ProxyService {
    return this.deps.createProxy ? this.deps.createProxy(shell) : new NginxProxy(shell);
  }

  private inspector(shell: RemoteShell): RemoteInspector {
    return new RemoteInspector(this.runtime(shell), this.proxy(shell), this.deps.log);
  }

  private executor(shell: RemoteShell): ActionExecutor {
    return new ActionExecutor(this.runtime(shell), this.proxy(shell), this.deps.log);
  }
}

/** Records a failed run in the log and maps it to its exit status. */
export function failureOutcome(log: DeployLog, label: string, error: unknown): RunOutcome {
  const cliError = toCliError(error);
  log.error(`${label} failed (${cliError.kind}): ${cliError.message}`);
  if (cliError.detail) {
    log.error(cliError.detail);
  }
  return { exitCode: cliError.exitCode, message: cliError.message, error: cliError };
}

export function describeHostState(state: HostState): string {
  return [
    `container=${state.containerExists ? (state.containerRunning ? "running" : "stopped") : "absent"}`,
    `image=${state.imageExists ? "present" : "absent"}`,
    `site-file=${state.proxySiteFileExists ? "present" : "absent"}`,
    `site-link=${state.proxySiteLinked ? "enabled" : "disabled"}`,
    `default-site=${state.defaultSiteLinked ? "enabled" : "disabled"}`
  ].join(" ");
}

import type { ContainerRuntime } from "./container-runtime";
import type { DeployLog } from "./deploy-log";
import type { ProxyService } from "./proxy";
import type { Action, ActionKind, DeploymentResult, FailureKind, StepOutcome } from "./types";

/**
 * How a failed action is treated. `absent-ok` failures mean the resource was
 * already gone, which is the post-condition the action exists to reach.
 */
export type Tolerance = { mode: "absent-ok" } | { mode: "fatal"; failure: FailureKind };

export const ACTION_TOLERANCE: Record<ActionKind, Tolerance> = {
  "stop-container": { mode: "absent-ok" },
  "remove-container": { mode: "absent-ok" },
  "remove-image": { mode: "absent-ok" },
  "verify-build-descriptor": { mode: "fatal", failure: "remote_build" },
  "build-image": { mode: "fatal", failure: "remote_build" },
  "run-container": { mode: "fatal", failure: "remote_run" },
  "write-proxy-config": { mode: "fatal", failure: "proxy" },
  "link-proxy-site": { mode: "fatal", failure: "proxy" },
  "unlink-proxy-site": { mode: "absent-ok" },
  "remove-proxy-config-file": { mode: "absent-ok" },
  "validate-proxy-config": { mode: "fatal", failure: "proxy" },
  "reload-proxy": { mode: "fatal", failure: "proxy" }
};

export function describeAction(action: Action): string {
  switch (action.kind) {
    case "stop-container":
      return `stop container ${action.name}`;
    case "remove-container":
      return `remove container ${action.name}`;
    case "remove-image":
      return `remove image ${action.name}`;
    case "verify-build-descriptor":
      return `verify build descriptor in ${action.path}`;
    case "build-image":
      return `build image ${action.tag} from ${action.path}`;
    case "run-container":
      return `run container ${action.name} from ${action.tag} on ${action.hostPort}:${action.containerPort}`;
    case "write-proxy-config":
      return `write proxy site ${action.site}`;
    case "link-proxy-site":
      return `enable proxy site ${action.site}`;
    case "unlink-proxy-site":
      return `disable proxy site ${action.site}`;
    case "remove-proxy-config-file":
      return `remove proxy config ${action.path}`;
    case "validate-proxy-config":
      return "validate proxy configuration";
    case "reload-proxy":
      return "reload proxy";
  }
}

export class ActionExecutor {
  private readonly runtime: ContainerRuntime;
  private readonly proxy: ProxyService;
  private readonly log?: DeployLog;

  constructor(runtime: ContainerRuntime, proxy: ProxyService, log?: DeployLog) {
    this.runtime = runtime;
    this.proxy = proxy;
    this.log = log;
  }

  async execute(action: Action): Promise<StepOutcome> {
    try {
      return await this.dispatch(action);
    } catch (error) {
      return { ok: false, detail: error instanceof Error ? error.message : String(error) };
    }
  }

  /**
   * Runs actions in order, absorbing tolerated failures, and stops at the
   * first fatal one.
   */
  async executeAll(actions: Action[]): Promise<DeploymentResult> {
    const executed: Action[] = [];
    for (const action of actions) {
      const description = describeAction(action);
      this.log?.info(`Action: ${description}`);
      const outcome = await this.execute(action);
      executed.push(action);
      if (outcome.ok) {
        continue;
      }

      const tolerance = ACTION_TOLERANCE[action.kind];
      const reason = outcome.detail ?? "unknown error";
      if (tolerance.mode === "absent-ok") {
        this.log?.warn(`${description}: ${reason} (already absent, continuing)`);
        continue;
      }

      const message = `Failed to ${description}: ${reason}`;
      this.log?.error(message);
      return { succeeded: false, failedAction: action, failureKind: tolerance.failure, message, executed };
    }
    return { succeeded: true, message: `Completed ${executed.length} action(s).`, executed };
  }

  private async dispatch(action: Action): Promise<StepOutcome> {
    switch (action.kind) {
      case "stop-container":
        return await this.runtime.stop(action.name);
      case "remove-container":
        return await this.runtime.remove(action.name);
      case "remove-image":
        return await this.runtime.removeImage(action.name);
      case "verify-build-descriptor":
        return (await this.runtime.hasBuildDescriptor(action.path))
          ? { ok: true }
          : { ok: false, detail: `no build descriptor found in ${action.path}` };
      case "build-image":
        return await this.runtime.build(action.path, action.tag);
      case "run-container":
        return await this.runtime.run(action.tag, action.hostPort, action.containerPort, action.name);
      case "write-proxy-config":
        return await this.proxy.writeConfig(action.site, action.content);
      case "link-proxy-site":
        return await this.proxy.linkSite(action.site);
      case "unlink-proxy-site":
        return await this.proxy.unlinkSite(action.site);
      case "remove-proxy-config-file":
        return await this.proxy.removeConfigFile(action.path);
      case "validate-proxy-config":
        return await this.proxy.validate();
      case "reload-proxy":
        return await this.reloadProxy();
    }
  }

  private async reloadProxy(): Promise<StepOutcome> {
    const reloaded = await this.proxy.reload();
    if (reloaded.ok) {
      return reloaded;
    }
    this.log?.warn(`Proxy reload failed (${reloaded.detail ?? "unknown error"}), restarting the service`);
    const restarted = await this.proxy.restart();
    if (restarted.ok) {
      return restarted;
    }
    return { ok: false, detail: `reload and restart both failed: ${restarted.detail ?? "unknown error"}` };
  }
}

import { ActionExecutor } from "./actions";
import { NGINX_DEFAULT_SITE } from "./constants";
import type { DeployLog } from "./deploy-log";
import { renderServerBlock } from "./proxy";
import type { Action, DeploymentResult, DeploymentTarget, HostState } from "./types";

/**
 * Ordered actions that take a host from `state` to `target`. Each step is a
 * precondition for the next: the old container and image go first so the
 * rebuild cannot collide with them, and the proxy is only touched once the
 * new container runs.
 */
export function planConvergence(state: HostState, target: DeploymentTarget, buildPath: string): Action[] {
  const actions: Action[] = [];

  if (state.containerExists) {
    actions.push({ kind: "stop-container", name: target.containerName });
    actions.push({ kind: "remove-container", name: target.containerName });
  }
  if (state.imageExists) {
    actions.push({ kind: "remove-image", name: target.imageName });
  }

  actions.push({ kind: "verify-build-descriptor", path: buildPath });
  actions.push({ kind: "build-image", path: buildPath, tag: target.imageName });
  actions.push({
    kind: "run-container",
    tag: target.imageName,
    name: target.containerName,
    hostPort: target.hostPort,
    containerPort: target.containerPort
  });

  actions.push({ kind: "write-proxy-config", site: target.proxySiteName, content: renderServerBlock(target) });
  actions.push({ kind: "link-proxy-site", site: target.proxySiteName });
  if (state.defaultSiteLinked && target.proxySiteName !== NGINX_DEFAULT_SITE) {
    actions.push({ kind: "unlink-proxy-site", site: NGINX_DEFAULT_SITE });
  }

  actions.push({ kind: "validate-proxy-config" });
  actions.push({ kind: "reload-proxy" });
  return actions;
}

export class ConvergenceEngine {
  private readonly executor: ActionExecutor;
  private readonly log?: DeployLog;

  constructor(executor: ActionExecutor, log?: DeployLog) {
    this.executor = executor;
    this.log = log;
  }

  async converge(state: HostState, target: DeploymentTarget, buildPath: string): Promise<DeploymentResult> {
    const plan = planConvergence(state, target, buildPath);
    this.log?.info(`Converging ${target.containerName}: ${plan.length} action(s) planned`);

    const result = await this.executor.executeAll(plan);
    if (!result.succeeded) {
      if (result.failureKind === "proxy") {
        return {
          ...result,
          message: `${result.message}. Container ${target.containerName} is running on port ${target.hostPort} but is not exposed through the proxy.`
        };
      }
      return result;
    }

    return {
      ...result,
      message: `Container ${target.containerName} is running on port ${target.hostPort} behind proxy site ${target.proxySiteName}.`
    };
  }
}

import { ActionExecutor } from "./actions";
import type { ContainerRuntime } from "./container-runtime";
import type { DeployLog } from "./deploy-log";
import { siteAvailablePath, siteEnabledPath } from "./proxy";
import type { Action, ContainerSummary, DeploymentResult, ImageSummary } from "./types";

/**
 * Host-wide cleanup. Every container and image goes, not only the deployed
 * ones, along with the proxy site in both locations.
 */
export function planTeardown(containers: ContainerSummary[], images: ImageSummary[], proxySiteName: string): Action[] {
  const actions: Action[] = [];
  for (const container of containers) {
    // Restarting and paused containers report as not running but still refuse `docker rm`.
    actions.push({ kind: "stop-container", name: container.name });
    actions.push({ kind: "remove-container", name: container.name });
  }
  for (const imageId of new Set(images.map((image) => image.id))) {
    actions.push({ kind: "remove-image", name: imageId });
  }
  actions.push({ kind: "remove-proxy-config-file", path: siteEnabledPath(proxySiteName) });
  actions.push({ kind: "remove-proxy-config-file", path: siteAvailablePath(proxySiteName) });
  actions.push({ kind: "reload-proxy" });
  return actions;
}

export class TeardownEngine {
  private readonly runtime: ContainerRuntime;
  private readonly executor: ActionExecutor;
  private readonly log?: DeployLog;

  constructor(runtime: ContainerRuntime, executor: ActionExecutor, log?: DeployLog) {
    this.runtime = runtime;
    this.executor = executor;
    this.log = log;
  }

  async teardown(proxySiteName: string): Promise<DeploymentResult> {
    const containers = await this.listOrEmpty("containers", () => this.runtime.listContainers());
    const images = await this.listOrEmpty("images", () => this.runtime.listImages());
    const plan = planTeardown(containers, images, proxySiteName);

    const result = await this.executor.executeAll(plan);
    if (!result.succeeded) {
      // Only the trailing reload can be fatal here; every removal was already attempted.
      this.log?.warn(result.message);
    }
    return {
      succeeded: true,
      message: `Removed ${containers.length} container(s), ${images.length} image(s) and proxy site ${proxySiteName}.`,
      executed: result.executed
    };
  }

  private async listOrEmpty<T>(label: string, fn: () => Promise<T[]>): Promise<T[]> {
    try {
      return await fn();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log?.warn(`Could not list ${label}, skipping: ${message}`);
      return [];
    }
  }
}

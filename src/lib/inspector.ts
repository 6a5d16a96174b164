import { NGINX_DEFAULT_SITE } from "./constants";
import { imageMatches, type ContainerRuntime } from "./container-runtime";
import type { DeployLog } from "./deploy-log";
import type { ProxyService } from "./proxy";
import type { DeploymentTarget, HostState } from "./types";

export const EMPTY_HOST_STATE: Readonly<HostState> = {
  containerExists: false,
  containerRunning: false,
  imageExists: false,
  proxySiteLinked: false,
  proxySiteFileExists: false,
  defaultSiteLinked: false
};

/**
 * Read-only view of the remote host. A query that fails is reported as the
 * resource being absent; inspection itself never throws.
 */
export class RemoteInspector {
  private readonly runtime: ContainerRuntime;
  private readonly proxy: ProxyService;
  private readonly log?: DeployLog;

  constructor(runtime: ContainerRuntime, proxy: ProxyService, log?: DeployLog) {
    this.runtime = runtime;
    this.proxy = proxy;
    this.log = log;
  }

  async inspect(target: DeploymentTarget): Promise<HostState> {
    const containers = await this.query("container list", () => this.runtime.listContainers(), []);
    const container = containers.find((entry) => entry.name === target.containerName);
    const images = await this.query("image list", () => this.runtime.listImages(), []);

    return {
      containerExists: Boolean(container),
      containerRunning: container?.running ?? false,
      imageExists: images.some((image) => imageMatches(image, target.imageName)),
      proxySiteLinked: await this.query("proxy site link", () => this.proxy.siteLinked(target.proxySiteName), false),
      proxySiteFileExists: await this.query("proxy site file", () => this.proxy.siteFileExists(target.proxySiteName), false),
      defaultSiteLinked: await this.query("default proxy site", () => this.proxy.siteLinked(NGINX_DEFAULT_SITE), false)
    };
  }

  private async query<T>(label: string, fn: () => Promise<T>, absent: T): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log?.warn(`Inspection of ${label} failed, treating as absent: ${message}`);
      return absent;
    }
  }
}

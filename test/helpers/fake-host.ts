import type { ContainerRuntime } from "../../src/lib/container-runtime";
import { DeployLog } from "../../src/lib/deploy-log";
import type { ProxyService } from "../../src/lib/proxy";
import type { RemoteExecOptions, RemoteSession, SessionFactory } from "../../src/lib/ssh";
import type { ContainerSummary, DeploymentTarget, ImageSummary, StepOutcome } from "../../src/lib/types";
import type { RunResult } from "../../src/lib/exec";

interface FakeContainer {
  image: string;
  running: boolean;
  /** Set for containers docker lists as neither running nor exited. */
  state?: "restarting" | "paused";
  hostPort: number;
  containerPort: number;
}

export interface FakeFailures {
  listContainers?: boolean;
  listImages?: boolean;
  build?: boolean;
  run?: boolean;
  validate?: boolean;
  reload?: boolean;
  restart?: boolean;
}

const OK: StepOutcome = { ok: true };

function fail(detail: string): StepOutcome {
  return { ok: false, detail };
}

/**
 * In-memory docker and nginx host. `calls` records every mutating call in
 * order; `loadedConfig` is what nginx currently serves.
 */
export class FakeHost {
  readonly containers = new Map<string, FakeContainer>();
  readonly images = new Map<string, ImageSummary>();
  readonly siteFiles = new Map<string, string>();
  readonly enabledSites = new Set<string>();
  readonly buildDescriptors = new Set<string>();
  readonly calls: string[] = [];
  failures: FakeFailures = {};
  loadedConfig = "";
  private nextImageId = 1;

  readonly runtime: ContainerRuntime = {
    listContainers: async () => {
      if (this.failures.listContainers) {
        throw new Error("docker ps failed: Cannot connect to the Docker daemon");
      }
      return [...this.containers.entries()].map(([name, container]): ContainerSummary => ({ name, running: container.running }));
    },
    listImages: async () => {
      if (this.failures.listImages) {
        throw new Error("docker images failed: Cannot connect to the Docker daemon");
      }
      return [...this.images.values()];
    },
    stop: async (name) => {
      this.calls.push(`stop ${name}`);
      const container = this.containers.get(name);
      if (!container) {
        return fail(`No such container: ${name}`);
      }
      container.running = false;
      container.state = undefined;
      return OK;
    },
    remove: async (name) => {
      this.calls.push(`rm ${name}`);
      const container = this.containers.get(name);
      if (!container) {
        return fail(`No such container: ${name}`);
      }
      if (container.running || container.state) {
        return fail(`You cannot remove a ${container.state ?? "running"} container ${name}. Stop the container before attempting removal or force remove`);
      }
      this.containers.delete(name);
      return OK;
    },
    removeImage: async (reference) => {
      this.calls.push(`rmi ${reference}`);
      const match = [...this.images.values()].find(
        (image) => image.id === reference || image.repository === reference || `${image.repository}:${image.tag}` === reference
      );
      if (!match) {
        return fail(`No such image: ${reference}`);
      }
      this.images.delete(match.id);
      return OK;
    },
    build: async (contextPath, tag) => {
      this.calls.push(`build ${tag} ${contextPath}`);
      if (this.failures.build) {
        return fail("failed to solve: process \"/bin/sh -c npm ci\" did not complete successfully");
      }
      if (!this.buildDescriptors.has(contextPath)) {
        return fail(`unable to prepare context: ${contextPath}/Dockerfile not found`);
      }
      const id = `img${this.nextImageId++}`;
      this.images.set(id, { id, repository: tag, tag: "latest" });
      return OK;
    },
    run: async (tag, hostPort, containerPort, name) => {
      this.calls.push(`run ${name} ${hostPort}:${containerPort}`);
      if (this.failures.run) {
        return fail("Cannot connect to the Docker daemon");
      }
      if (this.containers.has(name)) {
        return fail(`Conflict. The container name "/${name}" is already in use`);
      }
      if (![...this.images.values()].some((image) => image.repository === tag)) {
        return fail(`Unable to find image '${tag}:latest' locally`);
      }
      for (const container of this.containers.values()) {
        if (container.running && container.hostPort === hostPort) {
          return fail(`Bind for 0.0.0.0:${hostPort} failed: port is already allocated`);
        }
      }
      this.containers.set(name, { image: tag, running: true, hostPort, containerPort });
      return OK;
    },
    hasBuildDescriptor: async (contextPath) => this.buildDescriptors.has(contextPath)
  };

  readonly proxy: ProxyService = {
    writeConfig: async (site, serverBlock) => {
      this.calls.push(`write-site ${site}`);
      this.siteFiles.set(site, serverBlock);
      return OK;
    },
    validate: async () => {
      this.calls.push("nginx -t");
      if (this.failures.validate) {
        return fail("nginx: [emerg] unexpected \"}\" in /etc/nginx/sites-enabled/shipctl-app:12");
      }
      return OK;
    },
    reload: async () => {
      this.calls.push("reload");
      if (this.failures.reload) {
        return fail("Job for nginx.service failed");
      }
      this.loadedConfig = this.renderEnabled();
      return OK;
    },
    restart: async () => {
      this.calls.push("restart");
      if (this.failures.restart) {
        return fail("Job for nginx.service failed because the control process exited with error code");
      }
      this.loadedConfig = this.renderEnabled();
      return OK;
    },
    linkSite: async (site) => {
      this.calls.push(`link ${site}`);
      this.enabledSites.add(site);
      return OK;
    },
    unlinkSite: async (site) => {
      this.calls.push(`unlink ${site}`);
      this.enabledSites.delete(site);
      return OK;
    },
    removeConfigFile: async (filePath) => {
      this.calls.push(`rm-file ${filePath}`);
      const site = filePath.split("/").pop() ?? "";
      if (filePath.startsWith("/etc/nginx/sites-enabled/")) {
        this.enabledSites.delete(site);
      } else if (filePath.startsWith("/etc/nginx/sites-available/")) {
        this.siteFiles.delete(site);
      }
      return OK;
    },
    siteFileExists: async (site) => this.siteFiles.has(site),
    siteLinked: async (site) => this.enabledSites.has(site)
  };

  /** Seeds the stock nginx `default` site and loads it. */
  withDefaultSite(): this {
    this.siteFiles.set("default", "server { listen 80 default_server; root /var/www/html; }");
    this.enabledSites.add("default");
    this.loadedConfig = this.renderEnabled();
    return this;
  }

  /** Mutating calls only, in order. */
  mutations(): string[] {
    return this.calls.filter((call) => call !== "nginx -t");
  }

  inventory(): { containers: string[]; images: string[]; sites: string[]; enabled: string[] } {
    return {
      containers: [...this.containers.keys()].sort(),
      images: [...this.images.values()].map((image) => image.repository).sort(),
      sites: [...this.siteFiles.keys()].sort(),
      enabled: [...this.enabledSites].sort()
    };
  }

  private renderEnabled(): string {
    return [...this.enabledSites]
      .sort()
      .map((site) => this.siteFiles.get(site) ?? "")
      .join("\n");
  }
}

export const TARGET: DeploymentTarget = {
  containerName: "shop",
  imageName: "shop",
  hostPort: 8080,
  containerPort: 80,
  proxySiteName: "shop",
  proxyServerName: "_"
};

export const BUILD_PATH = "app";

export function memoryLog(): { log: DeployLog; lines: string[] } {
  const lines: string[] = [];
  const log = new DeployLog((line) => lines.push(line), { clock: () => new Date(2026, 2, 4, 9, 5, 7) });
  return { log, lines };
}

/** Session that accepts every command; records what ran. */
export class RecordingSession implements RemoteSession {
  readonly commands: string[] = [];
  readonly copies: Array<{ localPath: string; remoteDir: string }> = [];
  closed = false;
  failCopiesOf = new Set<string>();

  async exec(script: string, _options?: RemoteExecOptions): Promise<RunResult> {
    this.commands.push(script);
    return { stdout: "", stderr: "", exitCode: 0 };
  }

  async copy(localPath: string, remoteDir: string): Promise<StepOutcome> {
    this.copies.push({ localPath, remoteDir });
    const name = localPath.split(/[\\/]/).pop() ?? "";
    return this.failCopiesOf.has(name) ? fail("scp: Connection reset by peer") : OK;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function recordingSessions(configure?: (session: RecordingSession) => void): {
  factory: SessionFactory;
  sessions: RecordingSession[];
} {
  const sessions: RecordingSession[] = [];
  const factory: SessionFactory = async () => {
    const session = new RecordingSession();
    configure?.(session);
    sessions.push(session);
    return session;
  };
  return { factory, sessions };
}

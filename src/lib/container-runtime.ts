import { BUILD_DESCRIPTOR } from "./constants";
import type { RunResult } from "./exec";
import type { RemoteShell } from "./ssh";
import type { ContainerSummary, ImageSummary, StepOutcome } from "./types";
import { firstLine, shellQuote } from "./utils";

export interface ContainerRuntime {
  listContainers(): Promise<ContainerSummary[]>;
  listImages(): Promise<ImageSummary[]>;
  stop(name: string): Promise<StepOutcome>;
  remove(name: string): Promise<StepOutcome>;
  removeImage(reference: string): Promise<StepOutcome>;
  build(contextPath: string, tag: string): Promise<StepOutcome>;
  run(tag: string, hostPort: number, containerPort: number, name: string): Promise<StepOutcome>;
  hasBuildDescriptor(contextPath: string): Promise<boolean>;
}

export function toStepOutcome(result: RunResult): StepOutcome {
  if (result.exitCode === 0) {
    return { ok: true };
  }
  return {
    ok: false,
    detail: firstLine(result.stderr) || firstLine(result.stdout) || `exit code ${result.exitCode}`
  };
}

/** Docker CLI on the remote host, invoked through sudo. */
export class DockerRuntime implements ContainerRuntime {
  private readonly shell: RemoteShell;

  constructor(shell: RemoteShell) {
    this.shell = shell;
  }

  async listContainers(): Promise<ContainerSummary[]> {
    const result = await this.shell.exec("sudo docker ps -a --format '{{.Names}}\t{{.State}}'");
    if (result.exitCode !== 0) {
      throw new Error(`docker ps failed: ${toStepOutcome(result).detail}`);
    }
    return parseContainerList(result.stdout);
  }

  async listImages(): Promise<ImageSummary[]> {
    const result = await this.shell.exec("sudo docker images -a --format '{{.ID}}\t{{.Repository}}\t{{.Tag}}'");
    if (result.exitCode !== 0) {
      throw new Error(`docker images failed: ${toStepOutcome(result).detail}`);
    }
    return parseImageList(result.stdout);
  }

  async stop(name: string): Promise<StepOutcome> {
    return toStepOutcome(await this.shell.exec(`sudo docker stop ${shellQuote(name)}`));
  }

  async remove(name: string): Promise<StepOutcome> {
    return toStepOutcome(await this.shell.exec(`sudo docker rm ${shellQuote(name)}`));
  }

  async removeImage(reference: string): Promise<StepOutcome> {
    return toStepOutcome(await this.shell.exec(`sudo docker rmi -f ${shellQuote(reference)}`));
  }

  async build(contextPath: string, tag: string): Promise<StepOutcome> {
    return toStepOutcome(await this.shell.exec(`sudo docker build -t ${shellQuote(tag)} ${shellQuote(contextPath)}`));
  }

  async run(tag: string, hostPort: number, containerPort: number, name: string): Promise<StepOutcome> {
    const script = [
      "sudo docker run -d",
      `--name ${shellQuote(name)}`,
      "--restart unless-stopped",
      `-p ${hostPort}:${containerPort}`,
      shellQuote(tag)
    ].join(" ");
    return toStepOutcome(await this.shell.exec(script));
  }

  async hasBuildDescriptor(contextPath: string): Promise<boolean> {
    const result = await this.shell.exec(`test -f ${shellQuote(`${contextPath}/${BUILD_DESCRIPTOR}`)}`);
    return result.exitCode === 0;
  }
}

export function parseContainerList(stdout: string): ContainerSummary[] {
  const containers: ContainerSummary[] = [];
  for (const line of stdout.split("\n")) {
    const [name, state] = line.trim().split("\t");
    if (!name) {
      continue;
    }
    containers.push({ name, running: state === "running" });
  }
  return containers;
}

export function parseImageList(stdout: string): ImageSummary[] {
  const images: ImageSummary[] = [];
  for (const line of stdout.split("\n")) {
    const [id, repository, tag] = line.trim().split("\t");
    if (!id) {
      continue;
    }
    images.push({ id, repository: repository ?? "<none>", tag: tag ?? "<none>" });
  }
  return images;
}

export function imageMatches(image: ImageSummary, name: string): boolean {
  return image.repository === name || `${image.repository}:${image.tag}` === name;
}

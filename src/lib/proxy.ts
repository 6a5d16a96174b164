import { NGINX_SITES_AVAILABLE, NGINX_SITES_ENABLED } from "./constants";
import { toStepOutcome } from "./container-runtime";
import type { RemoteShell } from "./ssh";
import type { DeploymentTarget, StepOutcome } from "./types";
import { shellQuote } from "./utils";

export interface ProxyService {
  writeConfig(site: string, serverBlock: string): Promise<StepOutcome>;
  validate(): Promise<StepOutcome>;
  reload(): Promise<StepOutcome>;
  restart(): Promise<StepOutcome>;
  linkSite(site: string): Promise<StepOutcome>;
  unlinkSite(site: string): Promise<StepOutcome>;
  removeConfigFile(filePath: string): Promise<StepOutcome>;
  siteFileExists(site: string): Promise<boolean>;
  siteLinked(site: string): Promise<boolean>;
}

export function siteAvailablePath(site: string): string {
  return `${NGINX_SITES_AVAILABLE}/${site}`;
}

export function siteEnabledPath(site: string): string {
  return `${NGINX_SITES_ENABLED}/${site}`;
}

/** Server block routing all traffic on port 80 to the container's host port. */
export function renderServerBlock(target: DeploymentTarget): string {
  const catchAll = target.proxyServerName === "_";
  return [
    "server {",
    `    listen 80${catchAll ? " default_server" : ""};`,
    `    server_name ${target.proxyServerName};`,
    "",
    "    location / {",
    `        proxy_pass http://127.0.0.1:${target.hostPort};`,
    "        proxy_set_header Host $host;",
    "        proxy_set_header X-Real-IP $remote_addr;",
    "        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;",
    "        proxy_set_header X-Forwarded-Proto $scheme;",
    "    }",
    "}",
    ""
  ].join("\n");
}

export class NginxProxy implements ProxyService {
  private readonly shell: RemoteShell;

  constructor(shell: RemoteShell) {
    this.shell = shell;
  }

  async writeConfig(site: string, serverBlock: string): Promise<StepOutcome> {
    const script = `sudo tee ${shellQuote(siteAvailablePath(site))} > /dev/null`;
    return toStepOutcome(await this.shell.exec(script, { input: serverBlock }));
  }

  async validate(): Promise<StepOutcome> {
    return toStepOutcome(await this.shell.exec("sudo nginx -t"));
  }

  async reload(): Promise<StepOutcome> {
    return toStepOutcome(await this.shell.exec("sudo systemctl reload nginx"));
  }

  async restart(): Promise<StepOutcome> {
    return toStepOutcome(await this.shell.exec("sudo systemctl restart nginx"));
  }

  async linkSite(site: string): Promise<StepOutcome> {
    const script = `sudo ln -sf ${shellQuote(siteAvailablePath(site))} ${shellQuote(siteEnabledPath(site))}`;
    return toStepOutcome(await this.shell.exec(script));
  }

  async unlinkSite(site: string): Promise<StepOutcome> {
    return await this.removeConfigFile(siteEnabledPath(site));
  }

  async removeConfigFile(filePath: string): Promise<StepOutcome> {
    return toStepOutcome(await this.shell.exec(`sudo rm -f ${shellQuote(filePath)}`));
  }

  async siteFileExists(site: string): Promise<boolean> {
    const result = await this.shell.exec(`test -f ${shellQuote(siteAvailablePath(site))}`);
    return result.exitCode === 0;
  }

  async siteLinked(site: string): Promise<boolean> {
    const result = await this.shell.exec(`test -L ${shellQuote(siteEnabledPath(site))}`);
    return result.exitCode === 0;
  }
}

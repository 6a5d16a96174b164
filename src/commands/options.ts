import type { ConfigOverrides } from "../lib/config";
import { CliError } from "../lib/errors";
import { parsePort } from "../lib/params";

export interface DeployOptions {
  cleanup?: boolean;
  repo?: string;
  branch?: string;
  user?: string;
  host?: string;
  key?: string;
  port?: string;
  containerPort?: string;
  serverName?: string;
  site?: string;
  remoteDir?: string;
  context?: string;
  include?: string[];
  workDir?: string;
  local?: boolean;
  logDir?: string;
}

export function toConfigOverrides(options: DeployOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.containerPort !== undefined) {
    const containerPort = parsePort(options.containerPort);
    if (containerPort === undefined) {
      throw new CliError({ kind: "validation", message: "--container-port must be an integer between 1 and 65535." });
    }
    overrides.containerPort = containerPort;
  }
  if (options.serverName) {
    overrides.proxyServerName = options.serverName;
  }
  if (options.site) {
    overrides.proxySiteName = options.site;
  }
  if (options.remoteDir) {
    overrides.remoteDir = options.remoteDir;
  }
  if (options.logDir) {
    overrides.logDir = options.logDir;
  }
  return overrides;
}

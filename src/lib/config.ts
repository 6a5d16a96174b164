import path from "node:path";
import {
  DEFAULT_CONNECT_TIMEOUT_SECONDS,
  DEFAULT_CONTAINER_NAME,
  DEFAULT_CONTAINER_PORT,
  DEFAULT_IMAGE_NAME,
  DEFAULT_PROXY_SITE,
  DEFAULT_REMOTE_DIR,
  DEFAULT_SERVER_NAME,
  ENV_PREFIX
} from "./constants";
import { CliError } from "./errors";
import { collectErrors, parsePort, validateResourceName, validateServerName } from "./params";
import type { HostKeyPolicy } from "./ssh";
import { normalizeInputPath, parseMaybeNumber } from "./utils";

export interface DeployConfig {
  remoteDir: string;
  containerName: string;
  imageName: string;
  containerPort: number;
  proxySiteName: string;
  proxyServerName: string;
  logDir: string;
  connectTimeoutSeconds: number;
  hostKeyPolicy: HostKeyPolicy;
}

export type ConfigOverrides = Partial<DeployConfig>;

const HOST_KEY_POLICIES: readonly HostKeyPolicy[] = ["accept-new", "yes", "no"];

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[`${ENV_PREFIX}${key}`];
  return value && value.trim() ? value.trim() : undefined;
}

function isHostKeyPolicy(value: string): value is HostKeyPolicy {
  return HOST_KEY_POLICIES.some((policy) => policy === value);
}

export function resolveLogDir(env: NodeJS.ProcessEnv = process.env, override?: string): string {
  return path.resolve(normalizeInputPath(override ?? envValue(env, "LOG_DIR") ?? "."));
}

/**
 * Remote commands and scp both start in the login directory, so `~/app` and
 * `app` name the same place. A quoted `~` would not expand.
 */
export function normalizeRemoteDir(input: string): string {
  const trimmed = input.trim();
  if (trimmed === "~") {
    return ".";
  }
  if (trimmed.startsWith("~/")) {
    return trimmed.slice(2).replace(/^\/+/, "") || ".";
  }
  return trimmed;
}

/**
 * Defaults, then `SHIPCTL_*` environment variables, then explicit overrides
 * (command-line flags).
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): DeployConfig {
  const errors: string[] = [];

  const rawContainerPort = envValue(env, "CONTAINER_PORT");
  const envContainerPort = rawContainerPort === undefined ? undefined : parsePort(rawContainerPort);
  if (rawContainerPort !== undefined && envContainerPort === undefined) {
    errors.push(`${ENV_PREFIX}CONTAINER_PORT must be an integer between 1 and 65535.`);
  }

  const rawTimeout = envValue(env, "CONNECT_TIMEOUT");
  const envTimeout = parseMaybeNumber(rawTimeout);
  if (rawTimeout !== undefined && (envTimeout === undefined || !Number.isInteger(envTimeout) || envTimeout < 1)) {
    errors.push(`${ENV_PREFIX}CONNECT_TIMEOUT must be a positive whole number of seconds.`);
  }

  const rawPolicy = envValue(env, "HOST_KEY_CHECKING");
  let envPolicy: HostKeyPolicy | undefined;
  if (rawPolicy !== undefined) {
    if (isHostKeyPolicy(rawPolicy)) {
      envPolicy = rawPolicy;
    } else {
      errors.push(`${ENV_PREFIX}HOST_KEY_CHECKING must be one of: ${HOST_KEY_POLICIES.join(", ")}.`);
    }
  }

  const config: DeployConfig = {
    remoteDir: normalizeRemoteDir(overrides.remoteDir ?? envValue(env, "REMOTE_DIR") ?? DEFAULT_REMOTE_DIR),
    containerName: overrides.containerName ?? envValue(env, "CONTAINER_NAME") ?? DEFAULT_CONTAINER_NAME,
    imageName: overrides.imageName ?? envValue(env, "IMAGE_NAME") ?? DEFAULT_IMAGE_NAME,
    containerPort: overrides.containerPort ?? envContainerPort ?? DEFAULT_CONTAINER_PORT,
    proxySiteName: overrides.proxySiteName ?? envValue(env, "PROXY_SITE") ?? DEFAULT_PROXY_SITE,
    proxyServerName: overrides.proxyServerName ?? envValue(env, "SERVER_NAME") ?? DEFAULT_SERVER_NAME,
    logDir: resolveLogDir(env, overrides.logDir),
    connectTimeoutSeconds: overrides.connectTimeoutSeconds ?? envTimeout ?? DEFAULT_CONNECT_TIMEOUT_SECONDS,
    hostKeyPolicy: overrides.hostKeyPolicy ?? envPolicy ?? "accept-new"
  };

  errors.push(
    ...collectErrors([
      validateResourceName(config.containerName),
      validateResourceName(config.imageName),
      validateResourceName(config.proxySiteName),
      validateServerName(config.proxyServerName),
      config.remoteDir ? null : "Remote directory cannot be empty.",
      config.remoteDir.startsWith("~") ? `Remote directory ${config.remoteDir} must be relative to the login directory or absolute.` : null
    ])
  );

  if (errors.length > 0) {
    throw new CliError({
      kind: "validation",
      message: "Invalid configuration.",
      detail: errors.join("\n")
    });
  }
  return config;
}

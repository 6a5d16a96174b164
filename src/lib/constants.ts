export const CLI_NAME = "shipctl";
export const ENV_PREFIX = "SHIPCTL_";

export const BUILD_DESCRIPTOR = "Dockerfile";
export const DEFAULT_BRANCH = "main";

export const DEFAULT_CONTAINER_NAME = "shipctl-app";
export const DEFAULT_IMAGE_NAME = "shipctl-app";
export const DEFAULT_CONTAINER_PORT = 80;
export const DEFAULT_PROXY_SITE = "shipctl-app";
export const DEFAULT_SERVER_NAME = "_";

// Relative paths resolve against the remote user's home directory.
export const DEFAULT_REMOTE_DIR = "app";

export const NGINX_SITES_AVAILABLE = "/etc/nginx/sites-available";
export const NGINX_SITES_ENABLED = "/etc/nginx/sites-enabled";
export const NGINX_DEFAULT_SITE = "default";

export const DEFAULT_CONNECT_TIMEOUT_SECONDS = 5;
export const PING_COUNT = 3;

export const TRANSFER_EXCLUDES = [".git", "node_modules"] as const;

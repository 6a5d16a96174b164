import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { normalizeRemoteDir, resolveConfig } from "../src/lib/config";
import { CliError } from "../src/lib/errors";

test("resolveConfig falls back to defaults", () => {
  const config = resolveConfig({});
  assert.equal(config.remoteDir, "app");
  assert.equal(config.containerName, "shipctl-app");
  assert.equal(config.imageName, "shipctl-app");
  assert.equal(config.containerPort, 80);
  assert.equal(config.proxySiteName, "shipctl-app");
  assert.equal(config.proxyServerName, "_");
  assert.equal(config.logDir, path.resolve("."));
  assert.equal(config.connectTimeoutSeconds, 5);
  assert.equal(config.hostKeyPolicy, "accept-new");
});

test("environment variables override defaults and flags override both", () => {
  const env = {
    SHIPCTL_CONTAINER_PORT: "3000",
    SHIPCTL_CONTAINER_NAME: "shop",
    SHIPCTL_HOST_KEY_CHECKING: "yes",
    SHIPCTL_CONNECT_TIMEOUT: "12"
  };
  const config = resolveConfig(env, { containerPort: 5000 });
  assert.equal(config.containerPort, 5000);
  assert.equal(config.containerName, "shop");
  assert.equal(config.hostKeyPolicy, "yes");
  assert.equal(config.connectTimeoutSeconds, 12);
});

test("invalid settings are reported together", () => {
  assert.throws(
    () => resolveConfig({ SHIPCTL_CONTAINER_PORT: "http", SHIPCTL_IMAGE_NAME: "Bad Name" }),
    (error: unknown) => error instanceof CliError
      && error.kind === "validation"
      && error.detail === [
        "SHIPCTL_CONTAINER_PORT must be an integer between 1 and 65535.",
        "Invalid name 'Bad Name': use lowercase letters, digits, '.', '_' and '-'."
      ].join("\n")
  );
});

test("an unknown host key policy is rejected", () => {
  assert.throws(
    () => resolveConfig({ SHIPCTL_HOST_KEY_CHECKING: "maybe" }),
    (error: unknown) => error instanceof CliError
      && error.detail === "SHIPCTL_HOST_KEY_CHECKING must be one of: accept-new, yes, no."
  );
});

test("a home-relative remote directory is made relative to the login directory", () => {
  assert.equal(resolveConfig({ SHIPCTL_REMOTE_DIR: "~/apps/shop" }).remoteDir, "apps/shop");
  assert.equal(resolveConfig({}, { remoteDir: "~" }).remoteDir, ".");
  assert.equal(resolveConfig({ SHIPCTL_REMOTE_DIR: "/srv/shop" }).remoteDir, "/srv/shop");
  assert.equal(normalizeRemoteDir(" ~/ "), ".");
});

test("another user's home directory is rejected", () => {
  assert.throws(
    () => resolveConfig({ SHIPCTL_REMOTE_DIR: "~deploy/app" }),
    (error: unknown) => error instanceof CliError
      && error.detail === "Remote directory ~deploy/app must be relative to the login directory or absolute."
  );
});

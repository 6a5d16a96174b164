import test from "node:test";
import assert from "node:assert/strict";
import { CliError } from "../src/lib/errors";
import { ensurePrerequisites, installScript } from "../src/lib/prerequisites";
import { ScriptedShell } from "./helpers/scripted-shell";

test("installScript updates, installs and enables the service", () => {
  assert.equal(
    installScript({ command: "docker", aptPackage: "docker.io", service: "docker" }),
    "sudo apt-get update -y && sudo DEBIAN_FRONTEND=noninteractive apt-get install -y docker.io && sudo systemctl enable --now docker"
  );
});

test("installed tools are left alone", async () => {
  const shell = new ScriptedShell();
  const installed = await ensurePrerequisites(shell);
  assert.deepEqual(installed, []);
  assert.deepEqual(shell.commands, ["command -v docker", "command -v nginx"]);
});

test("missing tools are installed", async () => {
  const shell = new ScriptedShell().respond("command -v nginx", { stdout: "", stderr: "", exitCode: 1 });
  const installed = await ensurePrerequisites(shell);
  assert.deepEqual(installed, ["nginx"]);
  assert.deepEqual(shell.commands, [
    "command -v docker",
    "command -v nginx",
    "sudo apt-get update -y && sudo DEBIAN_FRONTEND=noninteractive apt-get install -y nginx && sudo systemctl enable --now nginx"
  ]);
});

test("a failed install is a provisioning error", async () => {
  const shell = new ScriptedShell()
    .respond("command -v docker", { stdout: "", stderr: "", exitCode: 1 })
    .respond("sudo apt-get", { stdout: "", stderr: "E: Could not get lock /var/lib/dpkg/lock-frontend\n", exitCode: 100 });

  await assert.rejects(
    ensurePrerequisites(shell),
    (error: unknown) => error instanceof CliError
      && error.kind === "provision"
      && error.exitCode === 5
      && error.message === "Failed to install docker.io on the remote host."
      && error.detail === "E: Could not get lock /var/lib/dpkg/lock-frontend"
  );
  assert.equal(shell.commands.length, 2);
});

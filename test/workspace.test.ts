import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { resolveConfig } from "../src/lib/config";
import { CliError } from "../src/lib/errors";
import {
  hasBuildDescriptor,
  listTransferItems,
  resolveRemoteBuildPath,
  transferFiles
} from "../src/lib/workspace";
import { RecordingSession, memoryLog } from "./helpers/fake-host";

function makeProject(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "shipctl-project-"));
  fs.writeFileSync(path.join(dir, "Dockerfile"), "FROM nginx:alpine\n");
  fs.writeFileSync(path.join(dir, "index.html"), "<h1>hello</h1>\n");
  fs.mkdirSync(path.join(dir, "assets"));
  fs.mkdirSync(path.join(dir, ".git"));
  fs.mkdirSync(path.join(dir, "node_modules"));
  return dir;
}

test("hasBuildDescriptor requires a Dockerfile file", () => {
  const dir = makeProject();
  assert.equal(hasBuildDescriptor(dir), true);
  assert.equal(hasBuildDescriptor(path.join(dir, "assets")), false);
});

test("listTransferItems skips version control and dependencies", () => {
  const dir = makeProject();
  assert.deepEqual(listTransferItems(dir), ["Dockerfile", "assets", "index.html"]);
});

test("an include list replaces the listing and drops missing entries", () => {
  const dir = makeProject();
  assert.deepEqual(listTransferItems(dir, ["Dockerfile", "missing.txt", "assets"]), ["Dockerfile", "assets"]);
});

test("resolveRemoteBuildPath joins a relative build context", () => {
  assert.equal(resolveRemoteBuildPath("app"), "app");
  assert.equal(resolveRemoteBuildPath("app", "."), "app");
  assert.equal(resolveRemoteBuildPath("app", "./services/web/"), "app/services/web");
});

test("transferFiles creates the directory and keeps going after a failed copy", async () => {
  const session = new RecordingSession();
  session.failCopiesOf.add("assets");
  const { log, lines } = memoryLog();

  const report = await transferFiles(session, "/work/site", ["Dockerfile", "assets", "index.html"], "app", log);

  assert.deepEqual(session.commands, ["mkdir -p app"]);
  assert.deepEqual(session.copies.map((copy) => copy.localPath), [
    path.join("/work/site", "Dockerfile"),
    path.join("/work/site", "assets"),
    path.join("/work/site", "index.html")
  ]);
  assert.deepEqual(report, { copied: ["Dockerfile", "index.html"], failed: ["assets"] });
  assert.ok(lines.includes("[2026-03-04 09:05:07] WARN Failed to copy assets: scp: Connection reset by peer"));
});

test("transferFiles fails when the remote directory cannot be created", async () => {
  const session = new RecordingSession();
  session.exec = async (script) => {
    session.commands.push(script);
    return { stdout: "", stderr: "mkdir: cannot create directory 'app': Permission denied\n", exitCode: 1 };
  };

  await assert.rejects(
    transferFiles(session, "/work/site", ["Dockerfile"], "app"),
    (error: unknown) => error instanceof CliError
      && error.kind === "provision"
      && error.message === "Failed to create remote directory app."
      && error.detail === "mkdir: cannot create directory 'app': Permission denied"
  );
  assert.equal(session.copies.length, 0);
});

test("a home-relative remote directory reaches mkdir unquoted", async () => {
  const session = new RecordingSession();
  const remoteDir = resolveConfig({ SHIPCTL_REMOTE_DIR: "~/app" }).remoteDir;

  await transferFiles(session, "/work/site", ["Dockerfile"], remoteDir);

  assert.deepEqual(session.commands, ["mkdir -p app"]);
  assert.deepEqual(session.copies, [{ localPath: path.join("/work/site", "Dockerfile"), remoteDir: "app" }]);
  assert.equal(resolveRemoteBuildPath(remoteDir), "app");
});

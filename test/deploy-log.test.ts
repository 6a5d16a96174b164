import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DeployLog, deployLogPath, openDeployLog } from "../src/lib/deploy-log";

const clock = () => new Date(2026, 2, 4, 9, 5, 7);

test("entries are timestamped with their level", () => {
  const lines: string[] = [];
  const log = new DeployLog((line) => lines.push(line), { clock });
  log.info("Repository ready");
  log.error("SSH connection failed");
  assert.deepEqual(lines, [
    "[2026-03-04 09:05:07] INFO Repository ready",
    "[2026-03-04 09:05:07] ERROR SSH connection failed"
  ]);
});

test("streamed output becomes one entry per non-empty line", () => {
  const lines: string[] = [];
  const log = new DeployLog((line) => lines.push(line), { clock });
  log.output("Step 1/3 : FROM nginx\n\nStep 2/3 : COPY . .\n");
  assert.deepEqual(lines, [
    "[2026-03-04 09:05:07] INFO   | Step 1/3 : FROM nginx",
    "[2026-03-04 09:05:07] INFO   | Step 2/3 : COPY . ."
  ]);
});

test("deployLogPath names the file after the day", () => {
  assert.equal(deployLogPath("/var/log/shipctl", new Date(2026, 0, 9)), path.join("/var/log/shipctl", "deploy_20260109.log"));
});

test("openDeployLog appends to the day's file", () => {
  const dir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "shipctl-log-")), "logs");
  const first = openDeployLog(dir, { clock });
  first.log.warn("ping failed");
  const second = openDeployLog(dir, { clock });

  assert.equal(first.filePath, path.join(dir, "deploy_20260304.log"));
  assert.equal(second.filePath, first.filePath);
  assert.equal(
    fs.readFileSync(first.filePath, "utf8"),
    [
      "[2026-03-04 09:05:07] INFO shipctl started",
      "[2026-03-04 09:05:07] WARN ping failed",
      "[2026-03-04 09:05:07] INFO shipctl started",
      ""
    ].join("\n")
  );
});

import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CliError } from "../src/lib/errors";
import { CommandError, type CommandRunner } from "../src/lib/exec";
import { authenticatedUrl, redactToken, repoDirName, syncSource, type SourceSpec } from "../src/lib/source";

const SPEC: SourceSpec = { repoUrl: "https://github.com/acme/site.git", token: "test-secret", branch: "main" };

test("repoDirName strips the .git suffix", () => {
  assert.equal(repoDirName("https://github.com/acme/site.git"), "site");
  assert.equal(repoDirName("https://gitlab.example.com/group/sub/api.git/"), "api");
});

test("authenticatedUrl places the token in the user part", () => {
  assert.equal(authenticatedUrl(SPEC.repoUrl, "test-secret"), "https://test-secret@github.com/acme/site.git");
});

test("redactToken hides every occurrence", () => {
  assert.equal(redactToken("a test-secret b test-secret", "test-secret"), "a *** b ***");
  assert.equal(redactToken("nothing to hide", ""), "nothing to hide");
});

test("syncSource clones the branch when no checkout exists", async () => {
  const baseDir = fs.mkdtempSync(path.join(os.tmpdir(), "shipctl-src-"));
  const calls: string[][] = [];
  const runner: CommandRunner = async (_command, args = []) => {
    calls.push(args);
    return { stdout: "", stderr: "", exitCode: 0 };
  };

  const checkout = await syncSource(SPEC, baseDir, { runner });

  assert.equal(checkout, path.join(baseDir, "site"));
  assert.deepEqual(calls, [["clone", "--branch", "main", "https://test-secret@github.com/acme/site.git", checkout]]);
});

test("syncSource pulls when the checkout exists", async () => {
  const baseDir = fs.mkdtempSync(path.join(os.tmpdir(), "shipctl-src-"));
  fs.mkdirSync(path.join(baseDir, "site"));
  const calls: string[][] = [];
  const runner: CommandRunner = async (_command, args = []) => {
    calls.push(args);
    return { stdout: "", stderr: "", exitCode: 0 };
  };

  await syncSource({ ...SPEC, branch: "release" }, baseDir, { runner });

  assert.deepEqual(calls, [["-C", path.join(baseDir, "site"), "pull", "origin", "release"]]);
});

test("a failed clone never leaks the token", async () => {
  const baseDir = fs.mkdtempSync(path.join(os.tmpdir(), "shipctl-src-"));
  const runner: CommandRunner = async () => {
    throw new CommandError(
      "git clone --branch main https://test-secret@github.com/acme/site.git /tmp/site",
      128,
      "",
      "fatal: Authentication failed for 'https://test-secret@github.com/acme/site.git/'"
    );
  };

  await assert.rejects(
    () => syncSource(SPEC, baseDir, { runner }),
    (error: unknown) => error instanceof CliError
      && error.kind === "local"
      && error.message === "Failed to fetch https://github.com/acme/site.git: Command failed (128): git clone --branch main https://***@github.com/acme/site.git /tmp/site"
      && error.detail === "fatal: Authentication failed for 'https://***@github.com/acme/site.git/'"
  );
});

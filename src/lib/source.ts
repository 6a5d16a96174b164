import fs from "node:fs";
import path from "node:path";
import type { DeployLog } from "./deploy-log";
import { CliError } from "./errors";
import { CommandError, runCommand, type CommandRunner } from "./exec";

export interface SourceSpec {
  repoUrl: string;
  token: string;
  branch: string;
}

export function repoDirName(repoUrl: string): string {
  const lastSegment = repoUrl.replace(/\/+$/, "").split("/").pop() ?? "";
  return lastSegment.replace(/\.git$/, "");
}

/** Embeds the access token as the URL's user part. */
export function authenticatedUrl(repoUrl: string, token: string): string {
  const url = new URL(repoUrl);
  url.username = encodeURIComponent(token);
  url.password = "";
  return url.toString();
}

export function redactToken(text: string, token: string): string {
  if (!token) {
    return text;
  }
  return text.split(token).join("***").split(encodeURIComponent(token)).join("***");
}

/**
 * Clones the repository into `baseDir`, or pulls the branch when the checkout
 * already exists. Returns the checkout directory.
 */
export async function syncSource(
  source: SourceSpec,
  baseDir: string,
  options: { runner?: CommandRunner; log?: DeployLog } = {}
): Promise<string> {
  const runner = options.runner ?? runCommand;
  const checkoutDir = path.join(baseDir, repoDirName(source.repoUrl));

  try {
    if (fs.existsSync(checkoutDir)) {
      options.log?.info(`Repository directory ${checkoutDir} exists, pulling ${source.branch}`);
      await runner("git", ["-C", checkoutDir, "pull", "origin", source.branch], { timeoutMs: 300_000 });
    } else {
      options.log?.info(`Cloning ${source.repoUrl} (${source.branch})`);
      await runner(
        "git",
        ["clone", "--branch", source.branch, authenticatedUrl(source.repoUrl, source.token), checkoutDir],
        { cwd: baseDir, timeoutMs: 300_000 }
      );
    }
  } catch (error) {
    throw sourceError(error, source);
  }

  options.log?.info(`Repository ready at ${checkoutDir}`);
  return checkoutDir;
}

function sourceError(error: unknown, source: SourceSpec): CliError {
  const raw = error instanceof CommandError
    ? [error.message, error.stderr].filter(Boolean).join("\n")
    : error instanceof Error ? error.message : String(error);
  const [message, ...rest] = redactToken(raw, source.token).split("\n");
  return new CliError({
    kind: "local",
    message: `Failed to fetch ${source.repoUrl}: ${message}`,
    hint: "Check the repository URL, branch name and access token.",
    detail: rest.join("\n") || undefined
  });
}

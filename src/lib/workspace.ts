import fs from "node:fs";
import path from "node:path";
import { BUILD_DESCRIPTOR, TRANSFER_EXCLUDES } from "./constants";
import type { DeployLog } from "./deploy-log";
import { CliError } from "./errors";
import type { RemoteSession } from "./ssh";
import { firstLine, shellQuote } from "./utils";

export function hasBuildDescriptor(projectDir: string): boolean {
  const stat = fs.statSync(path.join(projectDir, BUILD_DESCRIPTOR), { throwIfNoEntry: false });
  return Boolean(stat?.isFile());
}

/** Top-level entries to copy; an explicit include list wins over the directory listing. */
export function listTransferItems(projectDir: string, include?: string[]): string[] {
  if (include && include.length > 0) {
    return include.filter((item) => fs.existsSync(path.join(projectDir, item)));
  }
  const excluded = new Set<string>(TRANSFER_EXCLUDES);
  return fs
    .readdirSync(projectDir)
    .filter((entry) => !excluded.has(entry))
    .sort();
}

export function resolveRemoteBuildPath(remoteDir: string, buildContext?: string): string {
  const trimmed = buildContext?.replace(/^\.?\/+/, "").replace(/\/+$/, "");
  if (!trimmed || trimmed === ".") {
    return remoteDir;
  }
  return path.posix.join(remoteDir, trimmed);
}

export interface TransferReport {
  copied: string[];
  failed: string[];
}

/**
 * Creates the remote directory and copies each item. A failed copy is a
 * warning; the build descriptor check on the remote side catches anything fatal.
 */
export async function transferFiles(
  session: RemoteSession,
  projectDir: string,
  items: string[],
  remoteDir: string,
  log?: DeployLog
): Promise<TransferReport> {
  const mkdir = await session.exec(`mkdir -p ${shellQuote(remoteDir)}`);
  if (mkdir.exitCode !== 0) {
    throw new CliError({
      kind: "provision",
      message: `Failed to create remote directory ${remoteDir}.`,
      detail: firstLine(mkdir.stderr) || undefined
    });
  }

  const report: TransferReport = { copied: [], failed: [] };
  for (const item of items) {
    const outcome = await session.copy(path.join(projectDir, item), remoteDir);
    if (outcome.ok) {
      report.copied.push(item);
      log?.info(`Copied ${item}`);
    } else {
      report.failed.push(item);
      log?.warn(`Failed to copy ${item}: ${outcome.detail ?? "unknown error"}`);
    }
  }
  return report;
}

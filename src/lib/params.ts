import fs from "node:fs";
import { normalizeInputPath } from "./utils";

const REPO_URL_PATTERN = /^https:\/\/[^\s/@]+\/\S+\.git$/;
const BRANCH_PATTERN = /^(?!-)[A-Za-z0-9._/-]+$/;
const SSH_USER_PATTERN = /^[a-z_][a-z0-9_.-]*\$?$/i;
const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
const RESOURCE_NAME_PATTERN = /^[a-z0-9][a-z0-9_.-]*$/;
const SERVER_NAME_PATTERN = /^(_|[A-Za-z0-9*][A-Za-z0-9.*-]*)$/;

export function validateRepoUrl(input: string): string | null {
  if (!REPO_URL_PATTERN.test(input.trim())) {
    return "Repository URL must be an https URL ending in .git.";
  }
  return null;
}

export function validateToken(input: string): string | null {
  return input.trim() ? null : "Access token cannot be empty.";
}

export function validateBranch(input: string): string | null {
  if (!BRANCH_PATTERN.test(input.trim()) || input.includes("..")) {
    return `Invalid branch name: ${input}`;
  }
  return null;
}

export function validateSshUser(input: string): string | null {
  if (!input.trim()) {
    return "SSH username cannot be empty.";
  }
  if (!SSH_USER_PATTERN.test(input.trim())) {
    return `Invalid SSH username: ${input}`;
  }
  return null;
}

export function validateHost(input: string): string | null {
  const match = IPV4_PATTERN.exec(input.trim());
  if (!match || match.slice(1).some((octet) => Number(octet) > 255)) {
    return "Server address must be an IPv4 address such as 203.0.113.10.";
  }
  return null;
}

export function validateKeyPath(input: string): string | null {
  if (!input.trim()) {
    return "SSH key path cannot be empty.";
  }
  const resolved = normalizeInputPath(input);
  const stat = fs.statSync(resolved, { throwIfNoEntry: false });
  if (!stat || !stat.isFile()) {
    return `SSH key file does not exist at ${resolved}`;
  }
  return null;
}

export function parsePort(input: string | number): number | undefined {
  const text = String(input).trim();
  if (!/^\d+$/.test(text)) {
    return undefined;
  }
  const port = Number(text);
  return port >= 1 && port <= 65535 ? port : undefined;
}

export function validatePort(input: string | number): string | null {
  return parsePort(input) === undefined ? "Port must be an integer between 1 and 65535." : null;
}

export function validateResourceName(input: string): string | null {
  if (!RESOURCE_NAME_PATTERN.test(input)) {
    return `Invalid name '${input}': use lowercase letters, digits, '.', '_' and '-'.`;
  }
  return null;
}

export function validateServerName(input: string): string | null {
  if (!SERVER_NAME_PATTERN.test(input)) {
    return `Invalid proxy server name: ${input}`;
  }
  return null;
}

/** Collects every validation message; an empty list means the input is usable. */
export function collectErrors(checks: Array<string | null>): string[] {
  return checks.filter((message): message is string => message !== null);
}

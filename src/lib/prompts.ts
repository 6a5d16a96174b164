import inquirer from "inquirer";
import { DEFAULT_BRANCH, ENV_PREFIX } from "./constants";
import { CliError } from "./errors";
import {
  parsePort,
  validateBranch,
  validateHost,
  validateKeyPath,
  validatePort,
  validateRepoUrl,
  validateSshUser,
  validateToken
} from "./params";
import type { SourceSpec } from "./source";
import type { SshConnection } from "./types";

type Validator = (input: string) => string | null;

interface FieldSpec {
  flag: string;
  message: string;
  validate: Validator;
  mask?: boolean;
  defaultValue?: string;
}

/**
 * Uses the provided value when there is one, prompts on a TTY otherwise, and
 * fails in non-interactive mode.
 */
async function resolveField(provided: string | undefined, field: FieldSpec): Promise<string> {
  if (provided !== undefined && provided !== "") {
    const problem = field.validate(provided);
    if (problem) {
      throw new CliError({ kind: "validation", message: problem });
    }
    return provided.trim();
  }

  if (!process.stdout.isTTY) {
    if (field.defaultValue !== undefined) {
      return field.defaultValue;
    }
    throw new CliError({
      kind: "validation",
      message: `${field.message} is required in non-interactive mode.`,
      hint: `Pass ${field.flag}.`
    });
  }

  const validate = (input: string) => field.validate(input) ?? true;
  const question = field.mask
    ? { type: "password" as const, name: "value" as const, mask: "*", message: `${field.message}:`, validate }
    : { type: "input" as const, name: "value" as const, message: `${field.message}:`, default: field.defaultValue, validate };
  const answer = await inquirer.prompt<{ value: string }>([question]);
  return answer.value.trim();
}

export interface ConnectionFlags {
  user?: string;
  host?: string;
  key?: string;
}

export async function promptConnection(flags: ConnectionFlags): Promise<SshConnection> {
  const user = await resolveField(flags.user, { flag: "--user <name>", message: "SSH username", validate: validateSshUser });
  const host = await resolveField(flags.host, { flag: "--host <ip>", message: "Server IP address", validate: validateHost });
  const keyPath = await resolveField(flags.key, { flag: "--key <path>", message: "SSH private key path", validate: validateKeyPath });
  return { user, host, keyPath };
}

export interface SourceFlags {
  repo?: string;
  branch?: string;
}

export async function promptSource(flags: SourceFlags, env: NodeJS.ProcessEnv = process.env): Promise<SourceSpec> {
  const repoUrl = await resolveField(flags.repo, {
    flag: "--repo <url>",
    message: "Git repository URL",
    validate: validateRepoUrl
  });
  const token = await resolveField(env[`${ENV_PREFIX}GIT_TOKEN`], {
    flag: `${ENV_PREFIX}GIT_TOKEN in the environment`,
    message: "Personal access token",
    validate: validateToken,
    mask: true
  });
  const branch = await resolveField(flags.branch, {
    flag: "--branch <name>",
    message: "Branch name",
    validate: validateBranch,
    defaultValue: DEFAULT_BRANCH
  });
  return { repoUrl, token, branch };
}

export async function promptAppPort(flag: string | undefined): Promise<number> {
  const raw = await resolveField(flag, { flag: "--port <port>", message: "Application port", validate: validatePort });
  const port = parsePort(raw);
  if (port === undefined) {
    throw new CliError({ kind: "validation", message: "Port must be an integer between 1 and 65535." });
  }
  return port;
}

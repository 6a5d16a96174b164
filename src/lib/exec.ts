import { spawn } from "node:child_process";

export type OutputStream = "stdout" | "stderr";

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Zero disables the timeout. */
  timeoutMs?: number;
  allowNonZeroExit?: boolean;
  input?: string;
  onOutput?: (chunk: string, stream: OutputStream) => void;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (command: string, args?: string[], options?: RunOptions) => Promise<RunResult>;

export class CommandError extends Error {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;

  constructor(command: string, exitCode: number, stdout: string, stderr: string) {
    super(`Command failed (${exitCode}): ${command}`);
    this.name = "CommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export async function runCommand(command: string, args: string[] = [], options: RunOptions = {}): Promise<RunResult> {
  const timeoutMs = options.timeoutMs ?? 60_000;
  const env = options.env ? { ...process.env, ...options.env } : process.env;

  return await new Promise<RunResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env,
      stdio: [typeof options.input === "string" ? "pipe" : "ignore", "pipe", "pipe"]
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    let timeoutHandle: NodeJS.Timeout | undefined;
    if (timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        child.kill("SIGTERM");
        if (!settled) {
          settled = true;
          reject(new Error(`Command timed out after ${timeoutMs}ms: ${formatCommand(command, args)}`));
        }
      }, timeoutMs);
    }

    child.stdout?.on("data", (chunk: Buffer | string) => {
      const text = chunk.toString();
      stdout += text;
      options.onOutput?.(text, "stdout");
    });

    child.stderr?.on("data", (chunk: Buffer | string) => {
      const text = chunk.toString();
      stderr += text;
      options.onOutput?.(text, "stderr");
    });

    if (child.stdin && typeof options.input === "string") {
      child.stdin.on("error", () => {
        // The child exited before reading its input; the close handler reports the exit code.
      });
      child.stdin.end(options.input);
    }

    child.on("error", (error) => {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
      if (!settled) {
        settled = true;
        reject(error);
      }
    });

    child.on("close", (code) => {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
      const exitCode = typeof code === "number" ? code : 1;
      if (exitCode !== 0 && !options.allowNonZeroExit) {
        if (!settled) {
          settled = true;
          reject(new CommandError(formatCommand(command, args), exitCode, stdout.trim(), stderr.trim()));
        }
        return;
      }
      if (!settled) {
        settled = true;
        resolve({ stdout: stdout.trim(), stderr: stderr.trim(), exitCode });
      }
    });
  });
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

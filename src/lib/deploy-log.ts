import fs from "node:fs";
import path from "node:path";
import chalk from "chalk";
import { CLI_NAME } from "./constants";
import { formatDateStamp, formatTimestamp } from "./utils";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export type LogWriter = (line: string) => void;

export interface DeployLogOptions {
  clock?: () => Date;
  /** Mirror warnings and errors to the terminal. */
  echo?: boolean;
}

/**
 * Append-only deployment log. Every entry is one timestamped line; nothing is
 * ever rewritten.
 */
export class DeployLog {
  private readonly write: LogWriter;
  private readonly clock: () => Date;
  private readonly echo: boolean;

  constructor(write: LogWriter, options: DeployLogOptions = {}) {
    this.write = write;
    this.clock = options.clock ?? (() => new Date());
    this.echo = options.echo ?? false;
  }

  info(message: string): void {
    this.append("INFO", message);
  }

  warn(message: string): void {
    this.append("WARN", message);
    if (this.echo) {
      console.error(chalk.yellow(`warning: ${message}`));
    }
  }

  error(message: string): void {
    this.append("ERROR", message);
  }

  /** Records streamed command output, one entry per non-empty line. */
  output(chunk: string): void {
    for (const line of chunk.split("\n")) {
      const trimmed = line.trimEnd();
      if (trimmed) {
        this.append("INFO", `  | ${trimmed}`);
      }
    }
  }

  private append(level: LogLevel, message: string): void {
    this.write(`[${formatTimestamp(this.clock())}] ${level} ${message}`);
  }
}

export function deployLogPath(logDir: string, date = new Date()): string {
  return path.join(logDir, `deploy_${formatDateStamp(date)}.log`);
}

export function openDeployLog(logDir: string, options: DeployLogOptions = {}): { log: DeployLog; filePath: string } {
  const filePath = deployLogPath(logDir, options.clock ? options.clock() : new Date());
  fs.mkdirSync(logDir, { recursive: true });
  const log = new DeployLog((line) => fs.appendFileSync(filePath, `${line}\n`, "utf8"), options);
  log.info(`${CLI_NAME} started`);
  return { log, filePath };
}

import { execFile } from "child_process";
import { promisify } from "util";
import { GitLaunchError, formatCommand } from "./errors.js";
import type { Logger } from "./logger.js";
import type { ExecutionResult, GitRunner } from "./types.js";

const execFileAsync = promisify(execFile);

export interface ProcessRunnerOptions {
  binary: string;
  cwd: string;
  logger: Logger;
}

interface ExitError {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * execFile rejects on a non-zero exit with the exit status as a numeric code;
 * spawn failures carry a string code such as ENOENT instead
 */
function isExitError(error: unknown): error is ExitError {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "number" &&
    "stdout" in error &&
    typeof error.stdout === "string" &&
    "stderr" in error &&
    typeof error.stderr === "string"
  );
}

/**
 * Runs git as a child process without a shell
 * Non-zero exits resolve normally; only launch failures reject
 */
export class ProcessGitRunner implements GitRunner {
  readonly binary: string;
  private readonly cwd: string;
  private readonly logger: Logger;

  constructor(options: ProcessRunnerOptions) {
    this.binary = options.binary;
    this.cwd = options.cwd;
    this.logger = options.logger;
  }

  async run(args: readonly string[]): Promise<ExecutionResult> {
    const command = formatCommand(this.binary, args);
    this.logger.debug("Running git", { command, cwd: this.cwd });

    try {
      const { stdout, stderr } = await execFileAsync(this.binary, [...args], {
        cwd: this.cwd,
        encoding: "utf8",
        maxBuffer: 10 * 1024 * 1024, // 10MB: clone progress and status of large trees
      });
      return { exitCode: 0, stdout, stderr };
    } catch (error) {
      if (isExitError(error)) {
        return { exitCode: error.code, stdout: error.stdout, stderr: error.stderr };
      }
      throw new GitLaunchError(command, error);
    }
  }
}

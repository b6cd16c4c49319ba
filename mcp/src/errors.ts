import { ZodError } from "zod";

/**
 * git could not be started, or was stopped before it exited on its own
 * (missing binary, bad working directory, signal, output overflow)
 */
export class GitLaunchError extends Error {
  readonly command: string;

  constructor(command: string, cause: unknown) {
    super(`Failed to run ${command}: ${causeMessage(cause)}`, { cause });
    this.name = "GitLaunchError";
    this.command = command;
  }
}

/**
 * A git invocation exited non-zero at a step that has to succeed
 * for the operation to continue
 */
export class GitCommandError extends Error {
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string) {
    const detail = stderr.trim();
    super(
      `${command} failed with exit code ${exitCode}` + (detail ? `: ${detail}` : "")
    );
    this.name = "GitCommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * Human-readable message for anything thrown inside an operation
 */
export function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return `Invalid arguments: ${formatIssues(error)}`;
  }
  return causeMessage(error);
}

export function formatIssues(error: ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function causeMessage(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

export function formatCommand(binary: string, args: readonly string[]): string {
  return [binary, ...args].join(" ");
}

import { GitCommandError, GitLaunchError, describeError, formatCommand } from "./errors.js";
import type { Logger } from "./logger.js";
import {
  cloneArgsSchema,
  commitArgsSchema,
  createBranchArgsSchema,
  operationRequestSchema,
  pushArgsSchema,
  type CloneArgs,
  type CommitArgs,
  type CreateBranchArgs,
  type OperationRequest,
  type PushArgs,
} from "./schemas.js";
import type {
  BranchListResponse,
  CloneResponse,
  CommitResponse,
  CreateBranchResponse,
  ExecutionResult,
  GitRunner,
  OperationResponse,
  PushResponse,
  StatusResponse,
  ToolResponse,
} from "./types.js";

/**
 * Parse `git branch -a` output into branch names, in git's order.
 * The current branch keeps its entry with the "* " marker removed.
 */
export function parseBranchList(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => (line.startsWith("* ") ? line.slice(2) : line));
}

/**
 * Porcelain output with nothing but whitespace means no changes
 */
export function isCleanStatus(porcelain: string): boolean {
  return porcelain.trim().length === 0;
}

/**
 * Maps tool requests onto git invocations and normalizes what comes back.
 * Every public method resolves to a response; none of them reject.
 */
export class GitCommandAdapter {
  private readonly runner: GitRunner;
  private readonly logger: Logger;

  constructor(runner: GitRunner, logger: Logger) {
    this.runner = runner;
    this.logger = logger;
  }

  execute(request: OperationRequest): Promise<ToolResponse<OperationResponse>> {
    return this.guard("execute", async () => {
      const parsed = operationRequestSchema.parse(request);
      switch (parsed.operation) {
        case "clone":
          return this.clone(parsed);
        case "commit":
          return this.commit(parsed);
        case "push":
          return this.push(parsed);
        case "status":
          return this.status();
        case "branch_list":
          return this.branchList();
        case "create_branch":
          return this.createBranch(parsed);
      }
    });
  }

  clone(args: CloneArgs): Promise<ToolResponse<CloneResponse>> {
    return this.guard("clone", async () => {
      const { repository_url, destination } = cloneArgsSchema.parse(args);
      const command = ["clone", repository_url];
      if (destination) {
        command.push(destination);
      }

      const result = await this.git(command);
      return {
        success: result.exitCode === 0,
        output: result.stdout,
        error: result.stderr,
      };
    });
  }

  /**
   * Stage then commit. Staging stops at the first path git refuses;
   * anything already staged stays staged.
   */
  commit(args: CommitArgs): Promise<ToolResponse<CommitResponse>> {
    return this.guard("commit", async () => {
      const { message, files } = commitArgsSchema.parse(args);

      if (files && files.length > 0) {
        for (const file of files) {
          await this.gitOrThrow(["add", file]);
        }
      } else {
        await this.gitOrThrow(["add", "."]);
      }

      const result = await this.git(["commit", "-m", message]);
      return {
        success: result.exitCode === 0,
        commit_message: message,
        output: result.stdout,
      };
    });
  }

  push(args: PushArgs = {}): Promise<ToolResponse<PushResponse>> {
    return this.guard("push", async () => {
      const { remote, branch } = pushArgsSchema.parse(args);
      const result = await this.git(["push", remote, branch]);
      return {
        success: result.exitCode === 0,
        output: result.stdout,
        error: result.stderr,
      };
    });
  }

  status(): Promise<ToolResponse<StatusResponse>> {
    return this.guard("status", async () => {
      const result = await this.git(["status", "--porcelain"]);
      return {
        success: result.exitCode === 0,
        status: result.stdout,
        clean: isCleanStatus(result.stdout),
      };
    });
  }

  branchList(): Promise<ToolResponse<BranchListResponse>> {
    return this.guard("branch_list", async () => {
      const result = await this.git(["branch", "-a"]);
      return {
        success: result.exitCode === 0,
        branches: parseBranchList(result.stdout),
      };
    });
  }

  /**
   * Create a branch and optionally switch to it. Only the creation step
   * decides success; checked_out echoes the request.
   */
  createBranch(args: CreateBranchArgs): Promise<ToolResponse<CreateBranchResponse>> {
    return this.guard("create_branch", async () => {
      const { branch_name, checkout } = createBranchArgsSchema.parse(args);
      const created = await this.git(["branch", branch_name]);

      if (checkout && created.exitCode === 0) {
        const switched = await this.git(["checkout", branch_name]);
        if (switched.exitCode !== 0) {
          this.logger.warn("Branch created but checkout failed", {
            branch: branch_name,
            exitCode: switched.exitCode,
            stderr: switched.stderr,
          });
        }
      }

      return {
        success: created.exitCode === 0,
        branch: branch_name,
        checked_out: checkout,
      };
    });
  }

  private async git(args: string[]): Promise<ExecutionResult> {
    const result = await this.runner.run(args);
    if (result.exitCode !== 0) {
      this.logger.warn("git exited with non-zero status", {
        command: formatCommand(this.runner.binary, args),
        exitCode: result.exitCode,
      });
    }
    return result;
  }

  private async gitOrThrow(args: string[]): Promise<ExecutionResult> {
    const result = await this.git(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(formatCommand(this.runner.binary, args), result.exitCode, result.stderr);
    }
    return result;
  }

  /**
   * Operation boundary: anything thrown becomes { success: false, error }
   */
  private async guard<T>(operation: string, body: () => Promise<T>): Promise<ToolResponse<T>> {
    try {
      return await body();
    } catch (error) {
      const message = describeError(error);
      if (error instanceof GitLaunchError) {
        this.logger.error("Could not launch git", error, { operation });
      } else {
        this.logger.warn("Operation failed", { operation, error: message });
      }
      return { success: false, error: message };
    }
  }
}

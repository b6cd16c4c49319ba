/**
 * Outcome of a single git process invocation
 */
export interface ExecutionResult {
  exitCode: number;         // 0 on success
  stdout: string;           // Captured verbatim, never trimmed
  stderr: string;
}

/**
 * Launches git with an ordered argument list in the server's working directory
 */
export interface GitRunner {
  readonly binary: string;  // Executable name or path, as launched
  run(args: readonly string[]): Promise<ExecutionResult>;
}

/**
 * Returned in place of an operation's own fields when it could not complete
 */
export interface ToolFailure {
  success: false;
  error: string;
}

export interface CloneResponse {
  success: boolean;
  output: string;
  error: string;
}

export interface CommitResponse {
  success: boolean;
  commit_message: string;
  output: string;
}

export interface PushResponse {
  success: boolean;
  output: string;
  error: string;
}

export interface StatusResponse {
  success: boolean;
  status: string;           // Raw porcelain output
  clean: boolean;
}

export interface BranchListResponse {
  success: boolean;
  branches: string[];
}

export interface CreateBranchResponse {
  success: boolean;
  branch: string;
  checked_out: boolean;     // As requested, not verified
}

export type ToolResponse<T> = T | ToolFailure;

export type OperationResponse =
  | CloneResponse
  | CommitResponse
  | PushResponse
  | StatusResponse
  | BranchListResponse
  | CreateBranchResponse;

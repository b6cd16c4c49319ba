import {
  ErrorCode,
  McpError,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { formatIssues } from "./errors.js";
import type { GitCommandAdapter } from "./git.js";
import { OPERATION_DEFAULTS, operationRequestSchema, type OperationName } from "./schemas.js";

/**
 * Tool name advertised to clients for each adapter operation
 */
export const TOOL_OPERATIONS: Record<string, OperationName> = {
  git_clone: "clone",
  git_commit: "commit",
  git_push: "push",
  git_status: "status",
  git_branch_list: "branch_list",
  git_create_branch: "create_branch",
};

export const TOOLS: Tool[] = [
  {
    name: "git_clone",
    description: "Clone a git repository into the server's working directory.",
    inputSchema: {
      type: "object",
      properties: {
        repository_url: {
          type: "string",
          description: "URL or path of the repository to clone",
        },
        destination: {
          type: "string",
          description: "Directory to clone into (defaults to git's choice)",
        },
      },
      required: ["repository_url"],
    },
  },
  {
    name: "git_commit",
    description:
      "Stage files and commit them. Stages the listed files in order, " +
      "or everything in the working tree when no files are given.",
    inputSchema: {
      type: "object",
      properties: {
        message: {
          type: "string",
          description: "Commit message",
        },
        files: {
          type: "array",
          items: { type: "string" },
          description: "Paths to stage before committing",
        },
      },
      required: ["message"],
    },
  },
  {
    name: "git_push",
    description: "Push commits to a remote repository.",
    inputSchema: {
      type: "object",
      properties: {
        remote: {
          type: "string",
          description: "Remote name",
          default: OPERATION_DEFAULTS.push.remote,
        },
        branch: {
          type: "string",
          description: "Branch to push",
          default: OPERATION_DEFAULTS.push.branch,
        },
      },
      required: [],
    },
  },
  {
    name: "git_status",
    description:
      "Get repository status in porcelain format, with a flag telling " +
      "whether the working tree is clean.",
    inputSchema: {
      type: "object",
      properties: {},
      required: [],
    },
  },
  {
    name: "git_branch_list",
    description: "List all local and remote-tracking branches.",
    inputSchema: {
      type: "object",
      properties: {},
      required: [],
    },
  },
  {
    name: "git_create_branch",
    description: "Create a new branch and, unless told otherwise, check it out.",
    inputSchema: {
      type: "object",
      properties: {
        branch_name: {
          type: "string",
          description: "Name of the branch to create",
        },
        checkout: {
          type: "boolean",
          description: "Switch to the new branch after creating it",
          default: OPERATION_DEFAULTS.createBranch.checkout,
        },
      },
      required: ["branch_name"],
    },
  },
];

/**
 * Run one tools/call request against the adapter.
 * Operation failures come back as data; only bad arguments set isError.
 */
export async function callTool(
  adapter: GitCommandAdapter,
  name: string,
  args: Record<string, unknown> | undefined
): Promise<CallToolResult> {
  const operation = Object.hasOwn(TOOL_OPERATIONS, name) ? TOOL_OPERATIONS[name] : undefined;
  if (!operation) {
    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }

  const parsed = operationRequestSchema.safeParse({ ...args, operation });
  if (!parsed.success) {
    return {
      content: [{ type: "text", text: `Error: ${formatIssues(parsed.error)}` }],
      isError: true,
    };
  }

  const result = await adapter.execute(parsed.data);
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
  };
}

import { z } from "zod";

/**
 * Values used when a request leaves an optional argument out
 */
export const OPERATION_DEFAULTS = {
  push: {
    remote: "origin",
    branch: "main",
  },
  createBranch: {
    checkout: true,
  },
} as const;

export const cloneArgsSchema = z.object({
  repository_url: z.string(),
  destination: z.string().optional(),
});

export const commitArgsSchema = z.object({
  message: z.string(),
  files: z.array(z.string()).optional(),
});

export const pushArgsSchema = z.object({
  remote: z.string().default(OPERATION_DEFAULTS.push.remote),
  branch: z.string().default(OPERATION_DEFAULTS.push.branch),
});

export const statusArgsSchema = z.object({});

export const branchListArgsSchema = z.object({});

export const createBranchArgsSchema = z.object({
  branch_name: z.string(),
  checkout: z.boolean().default(OPERATION_DEFAULTS.createBranch.checkout),
});

export const operationRequestSchema = z.discriminatedUnion("operation", [
  cloneArgsSchema.extend({ operation: z.literal("clone") }),
  commitArgsSchema.extend({ operation: z.literal("commit") }),
  pushArgsSchema.extend({ operation: z.literal("push") }),
  statusArgsSchema.extend({ operation: z.literal("status") }),
  branchListArgsSchema.extend({ operation: z.literal("branch_list") }),
  createBranchArgsSchema.extend({ operation: z.literal("create_branch") }),
]);

// Inputs keep defaulted fields optional; callers may omit them
export type CloneArgs = z.input<typeof cloneArgsSchema>;
export type CommitArgs = z.input<typeof commitArgsSchema>;
export type PushArgs = z.input<typeof pushArgsSchema>;
export type CreateBranchArgs = z.input<typeof createBranchArgsSchema>;

export type OperationRequest = z.input<typeof operationRequestSchema>;
export type OperationName = OperationRequest["operation"];

import { z } from "zod";
import { formatIssues } from "./errors.js";
import type { LogLevel } from "./logger.js";

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

const envSchema = z.object({
  GIT_MCP_GIT_BINARY: z.string().min(1).default("git"),
  GIT_MCP_LOG_LEVEL: logLevelSchema.optional(),
  LOG_LEVEL: logLevelSchema.optional(),
  GIT_MCP_LOG_PRETTY: z.enum(["true", "false", "1", "0"]).optional(),
});

export interface ServerConfig {
  gitBinary: string;
  /** git always runs here; requests cannot override it */
  workingDirectory: string;
  logLevel: LogLevel;
  prettyLogs: boolean;
}

/**
 * Read server configuration from environment variables
 * Throws with every invalid variable listed
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  workingDirectory: string = process.cwd()
): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const vars = parsed.data;
  return {
    gitBinary: vars.GIT_MCP_GIT_BINARY,
    workingDirectory,
    logLevel: vars.GIT_MCP_LOG_LEVEL ?? vars.LOG_LEVEL ?? "info",
    prettyLogs: vars.GIT_MCP_LOG_PRETTY === "true" || vars.GIT_MCP_LOG_PRETTY === "1",
  };
}

#!/usr/bin/env node

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { loadConfig, type ServerConfig } from "./config.js";
import { GitCommandAdapter } from "./git.js";
import { Logger, createLogger } from "./logger.js";
import { ProcessGitRunner } from "./runner.js";
import { TOOLS, callTool } from "./tools.js";

const SERVER_NAME = "git-tools-mcp";
const SERVER_VERSION = "0.1.0";

/**
 * MCP server exposing clone, commit, push, status and branch tools
 * for the repository in its working directory
 */
class GitToolsServer {
  private server: Server;
  private adapter: GitCommandAdapter;
  private logger: Logger;

  constructor(config: ServerConfig, logger: Logger) {
    this.logger = logger;
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    const runner = new ProcessGitRunner({
      binary: config.gitBinary,
      cwd: config.workingDirectory,
      logger: logger.child({ component: "runner" }),
    });
    this.adapter = new GitCommandAdapter(runner, logger.child({ component: "adapter" }));

    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: TOOLS,
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      this.logger.info("Tool call", { tool: name });
      return callTool(this.adapter, name, args);
    });
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.logger.info("Git tools MCP server running on stdio");
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: config.prettyLogs });
  logger.info("Starting", { cwd: config.workingDirectory, git: config.gitBinary });
  await new GitToolsServer(config, logger).run();
}

main().catch((error: unknown) => {
  console.error("Server error:", error);
  process.exit(1);
});

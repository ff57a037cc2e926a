import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { DEFAULT_RUNNER_COMMAND } from "../core/schema.js";
import { loadConfig } from "../utils/config.js";
import { CommandTestRunner } from "../validator/runner.js";
import { registerTools } from "./tools.js";

export const SERVER_INFO = { name: "testsmith", version: "0.1.0" } as const;

/**
 * Serve the analysis and validation tools over stdio. The runner configured
 * for `rootPath` is resolved once and shared by every `validate_tests` call.
 */
export async function startMcpServer(rootPath: string): Promise<void> {
  const config = await loadConfig(rootPath);
  const runnerCommand = config?.runner ?? DEFAULT_RUNNER_COMMAND;

  const server = new McpServer({ ...SERVER_INFO });
  registerTools(server, rootPath, new CommandTestRunner(runnerCommand));

  await server.connect(new StdioServerTransport());

  // stdout carries JSON-RPC
  console.error(`[${SERVER_INFO.name}] MCP server started`);
  console.error(`[${SERVER_INFO.name}] Project root: ${rootPath}`);
  console.error(`[${SERVER_INFO.name}] Test runner: ${runnerCommand.join(" ")}`);
}

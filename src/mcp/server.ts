import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppContext } from "../context.js";
import { registerTools } from "./tools.js";
import { registerResources } from "./resources.js";
import { registerPrompts } from "./prompts.js";

export function createMcpServer(ctx: AppContext): McpServer {
  const server = new McpServer(
    {
      name: "city-api-catalog",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {},
      },
    },
  );

  registerTools(server, ctx);
  registerResources(server, ctx);
  registerPrompts(server);

  return server;
}

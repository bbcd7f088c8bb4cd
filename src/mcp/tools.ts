import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppContext } from "../context.js";
import { operations } from "./operations.js";

export function registerTools(server: McpServer, ctx: AppContext): void {
  for (const op of operations) {
    server.tool(op.name, op.description, op.input, async (args) => op.invoke(ctx, args));
  }
}

#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { config } from "../config/index.js";
import { createAppContext } from "../context.js";
import { logger } from "../utils/logger.js";
import { createMcpServer } from "./server.js";

async function main() {
  const server = createMcpServer(createAppContext(config));
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ dataDir: config.DATA_DIR }, "MCP stdio server ready");
}

main().catch((err) => {
  process.stderr.write("MCP stdio server failed: " + String(err) + "\n");
  process.exit(1);
});

import type { FastifyInstance } from "fastify";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import type { AppContext } from "../context.js";
import { createMcpServer } from "./server.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("mcp-sse");

export async function mcpSseRoutes(app: FastifyInstance, opts: { ctx: AppContext }): Promise<void> {
  const transports = new Map<string, SSEServerTransport>();

  app.addHook("onClose", async () => {
    for (const [sessionId, transport] of transports) {
      await transport.close();
      transports.delete(sessionId);
    }
  });

  app.get("/sse", async (request, reply) => {
    log.info("New SSE connection");

    reply.hijack();

    const transport = new SSEServerTransport("/mcp/messages", reply.raw);
    const mcpServer = createMcpServer(opts.ctx);

    const sessionId = transport.sessionId;
    transports.set(sessionId, transport);

    request.raw.on("close", () => {
      log.info({ sessionId }, "SSE connection closed");
      transports.delete(sessionId);
    });

    await mcpServer.connect(transport);
  });

  app.post<{ Querystring: { sessionId?: string } }>("/messages", async (request, reply) => {
    const { sessionId } = request.query;
    const transport = sessionId ? transports.get(sessionId) : undefined;

    if (!transport) {
      log.warn({ sessionId }, "Message for unknown SSE session");
      return reply.code(404).send({ error: "Session not found" });
    }

    reply.hijack();
    await transport.handlePostMessage(request.raw, reply.raw, request.body);
  });
}

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import type { AppContext } from "../context.js";
import { CatalogError, httpStatusFor } from "../errors.js";
import { createChildLogger } from "../utils/logger.js";
import { adminRoutes } from "./routes/admin.js";
import { catalogRoutes } from "./routes/catalog.js";
import { mcpSseRoutes } from "../mcp/sse-transport.js";

const log = createChildLogger("http");

export async function buildApp(ctx: AppContext): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });

  // Plugins
  await app.register(cors, { origin: true });

  app.setErrorHandler((err, request, reply) => {
    if (err instanceof CatalogError) {
      const status = httpStatusFor(err.kind);
      log.warn({ url: request.url, kind: err.kind, status }, err.message);
      return reply.code(status).send({ error: err.kind, message: err.message });
    }

    const status = err.statusCode ?? 500;
    if (status >= 500) {
      log.error({ url: request.url, err }, "Request failed");
    }
    return reply.code(status).send({ error: status >= 500 ? "UnexpectedError" : err.name, message: err.message });
  });

  // API Routes
  await app.register(adminRoutes, { prefix: "/api/v1/admin", ctx });
  await app.register(catalogRoutes, { prefix: "/api/v1", ctx });
  await app.register(mcpSseRoutes, { prefix: "/mcp", ctx });

  // Health check
  app.get("/health", async () => ({ status: "ok", timestamp: new Date().toISOString() }));

  return app;
}

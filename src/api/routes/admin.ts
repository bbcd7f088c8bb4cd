import type { FastifyInstance } from "fastify";
import type { AppContext } from "../../context.js";

export async function adminRoutes(app: FastifyInstance, opts: { ctx: AppContext }): Promise<void> {
  // Simple API key auth for admin routes
  app.addHook("onRequest", async (request, reply) => {
    const apiKey = request.headers["x-api-key"];
    if (apiKey !== opts.ctx.config.ADMIN_API_KEY) {
      return reply.code(401).send({ error: "Unauthorized" });
    }
  });

  // Scrape the catalog and refresh the cache
  app.post("/scrape", async (_request, reply) => {
    const run = await opts.ctx.scrape();
    return reply.send({ summary: run.summary, files: run.saved.files.length });
  });

  app.get("/status", async () => opts.ctx.store.stats());
}

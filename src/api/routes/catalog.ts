import type { FastifyInstance } from "fastify";
import type { AppContext } from "../../context.js";
import { generateCommand } from "../../ngsi/command-generator.js";

export async function catalogRoutes(app: FastifyInstance, opts: { ctx: AppContext }): Promise<void> {
  const { store } = opts.ctx;

  // List cached APIs, or search them
  app.get<{ Querystring: { search?: string } }>("/apis", async (request, reply) => {
    const search = request.query.search;

    if (search !== undefined) {
      const docs = await store.search(search);
      return reply.send({ data: docs, total: docs.length });
    }

    const index = await store.listSummary();
    const data = Object.entries(index).map(([id, entry]) => ({ id, ...entry }));
    return reply.send({ data, total: data.length });
  });

  app.get<{ Params: { id: string } }>("/apis/:id", async (request, reply) => {
    return reply.send(await store.load(request.params.id));
  });

  // Example entity queries for a cached API
  app.get<{ Params: { id: string } }>("/apis/:id/commands", async (request, reply) => {
    const { examples } = await generateCommand(store, request.params.id, opts.ctx.commandTarget);
    return reply.send({ data: examples, total: examples.length });
  });

  app.get<{ Params: { tag: string } }>("/groups/:tag", async (request, reply) => {
    const docs = await store.loadGroup(request.params.tag);
    return reply.send({ tag: request.params.tag, data: docs, total: docs.length });
  });
}

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppContext } from "../context.js";
import { CATALOG_INFO, formatDocumentList, formatStatus } from "./format.js";

interface CatalogResource {
  name: string;
  uri: string;
  description: string;
  mimeType: "application/json" | "text/markdown";
  read(ctx: AppContext): Promise<string>;
}

export const catalogResources: CatalogResource[] = [
  {
    name: "api-docs",
    uri: "city-catalog://api-docs",
    description: "Summary of every cached API: id, name and tags",
    mimeType: "application/json",
    read: async (ctx) => JSON.stringify(await ctx.store.listSummary(), null, 2),
  },
  {
    name: "api-docs-detail",
    uri: "city-catalog://api-docs/detail",
    description: "Every cached API document in full",
    mimeType: "application/json",
    read: async (ctx) => JSON.stringify(await ctx.store.listDocuments(), null, 2),
  },
  {
    name: "status",
    uri: "city-catalog://status",
    description: "Cache status: document count, groups and last scrape time",
    mimeType: "text/markdown",
    read: async (ctx) => formatStatus(await ctx.store.stats(), ctx.store.dir),
  },
  {
    name: "disaster-apis",
    uri: "city-catalog://groups/disaster",
    description: "Cached APIs tagged as disaster-prevention related",
    mimeType: "text/markdown",
    read: async (ctx) => formatDocumentList("Disaster APIs", await ctx.store.loadGroup("disaster")),
  },
  {
    name: "info",
    uri: "city-catalog://info",
    description: "What this server offers and how the entity API is addressed",
    mimeType: "text/markdown",
    read: async () => CATALOG_INFO,
  },
];

export function registerResources(server: McpServer, ctx: AppContext): void {
  for (const resource of catalogResources) {
    server.resource(
      resource.name,
      resource.uri,
      {
        description: resource.description,
        mimeType: resource.mimeType,
      },
      async () => ({
        contents: [
          {
            uri: resource.uri,
            mimeType: resource.mimeType,
            text: await resource.read(ctx),
          },
        ],
      }),
    );
  }
}

import { z } from "zod/v4";
import { createChildLogger } from "../utils/logger.js";
import { NotFoundError, ValidationError, toFailure, type Failure } from "../errors.js";
import { generateCommand } from "../ngsi/command-generator.js";
import { queryParameterShape } from "../ngsi/types.js";
import { documentIdSchema } from "../store/schema.js";
import type { AppContext } from "../context.js";
import {
  formatCatalogIndex,
  formatCommands,
  formatDocument,
  formatFailure,
  formatQueryResult,
  formatScrapeRun,
  formatSearchResults,
} from "./format.js";

const log = createChildLogger("mcp-operations");

// A type alias, not an interface: the SDK's result types carry index signatures.
export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export type InputShape = Record<string, z.ZodType>;

export interface Operation {
  name: string;
  description: string;
  input: InputShape;
  invoke(ctx: AppContext, args: unknown): Promise<ToolResult>;
}

function text(body: string): ToolResult {
  return { content: [{ type: "text", text: body }] };
}

function failed(failure: Failure): ToolResult {
  return { content: [{ type: "text", text: formatFailure(failure) }], isError: true };
}

/**
 * Binds a handler to its input shape. `invoke` validates the raw arguments and
 * turns anything the handler throws into an `isError` result.
 */
function defineOperation<S extends InputShape>(definition: {
  name: string;
  description: string;
  input: S;
  handler: (ctx: AppContext, args: z.output<z.ZodObject<S>>) => Promise<ToolResult>;
}): Operation {
  const schema = z.object(definition.input);

  return {
    name: definition.name,
    description: definition.description,
    input: definition.input,
    async invoke(ctx, args) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        return failed(
          toFailure(new ValidationError(`Invalid arguments for ${definition.name}`, [z.prettifyError(parsed.error)])),
        );
      }
      try {
        return await definition.handler(ctx, parsed.data);
      } catch (err) {
        const failure = toFailure(err);
        if (failure.kind === "UnexpectedError") {
          log.error({ operation: definition.name, err }, "Operation failed");
        } else {
          log.warn({ operation: definition.name, kind: failure.kind, err }, "Operation failed");
        }
        return failed(failure);
      }
    },
  };
}

export const operations: Operation[] = [
  defineOperation({
    name: "scrape_api_docs",
    description:
      "Log into the city API catalog with the configured credentials, scrape every API detail page and refresh the local cache. Returns counts, tag distribution and any skipped pages.",
    input: {},
    handler: async (ctx) => text(formatScrapeRun(await ctx.scrape())),
  }),

  defineOperation({
    name: "search_api_docs",
    description:
      "Search cached API documents by keyword (Japanese or English). Matches names, descriptions and attribute names; name matches come first.",
    input: {
      keyword: z.string().min(1).describe("Keyword, e.g. '避難' or 'AED'"),
    },
    handler: async (ctx, { keyword }) => text(formatSearchResults(keyword, await ctx.store.search(keyword))),
  }),

  defineOperation({
    name: "get_api_details",
    description:
      "Get one cached API document by id: description, attribute table, endpoints, example payloads and service path.",
    input: {
      api_name: documentIdSchema.describe("API id as listed by list_saved_apis"),
    },
    handler: async (ctx, { api_name }) => text(formatDocument(await ctx.store.load(api_name))),
  }),

  defineOperation({
    name: "list_saved_apis",
    description: "List every cached API with its tags.",
    input: {},
    handler: async (ctx) => text(formatCatalogIndex(await ctx.store.listSummary())),
  }),

  defineOperation({
    name: "generate_api_command",
    description:
      "Generate ready-to-run entity API queries (basic, by id, geographic, attribute filter, count) for a cached entity type. Makes no network call.",
    input: {
      entity_type: documentIdSchema.describe("Entity type, i.e. the cached API id"),
    },
    handler: async (ctx, { entity_type }) =>
      text(formatCommands(await generateCommand(ctx.store, entity_type, ctx.commandTarget))),
  }),

  defineOperation({
    name: "execute_entity_query",
    description:
      "Run a live query against the city's NGSI v2 entity API. Uses the cached service path when the entity type is cached. Reports status, rate limit and a summary of the returned entities.",
    input: {
      entity_type: z.string().min(1).describe("Entity type to query"),
      ...queryParameterShape,
    },
    handler: async (ctx, { entity_type, ...parameters }) => {
      const servicePath = await cachedServicePath(ctx, entity_type);
      const result = await ctx.entityClient.execute(entity_type, parameters, { servicePath });
      return { content: [{ type: "text", text: formatQueryResult(result) }], isError: !result.ok };
    },
  }),
];

async function cachedServicePath(ctx: AppContext, entityType: string): Promise<string | undefined> {
  if (!documentIdSchema.safeParse(entityType).success) return undefined;
  try {
    return (await ctx.store.load(entityType)).servicePath;
  } catch (err) {
    if (!(err instanceof NotFoundError)) {
      log.warn({ entityType, err }, "Cached document unreadable, using the default service path");
    }
    return undefined;
  }
}

export function findOperation(name: string): Operation | undefined {
  return operations.find((op) => op.name === name);
}

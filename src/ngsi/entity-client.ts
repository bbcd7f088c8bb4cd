import { randomUUID } from "crypto";
import { z } from "zod/v4";
import { createChildLogger } from "../utils/logger.js";
import { fetchWithRetry } from "../utils/http-client.js";
import { truncate } from "../utils/text.js";
import { documentIdSchema } from "../store/schema.js";
import {
  AuthenticationError,
  FetchError,
  NotFoundError,
  ParseError,
  RateLimitError,
  ValidationError,
  type CatalogError,
  toFailure,
} from "../errors.js";
import {
  buildEntityHeaders,
  buildEntityQuery,
  buildEntityUrl,
  defaultServicePath,
  readRateLimit,
} from "./query-builder.js";
import { summarizeEntities } from "./summarize.js";
import {
  queryParametersSchema,
  type EntityQueryResult,
  type NgsiEntity,
  type RateLimitInfo,
} from "./types.js";

const log = createChildLogger("entity-client");

const BODY_EXCERPT = 500;
const NO_RATE_LIMIT: RateLimitInfo = { remaining: null, limit: null, reset: null };

export interface EntityApiClientOptions {
  baseUrl: string;
  apiKey: string | undefined;
  fiwareService: string;
  timeout?: number;
  traceId?: () => string;
}

export interface ExecuteOptions {
  /** Overrides the default `/<entityType>` service path. */
  servicePath?: string;
}

function isRecord(value: unknown): value is NgsiEntity {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorForStatus(
  status: number,
  entityType: string,
  servicePath: string,
  body: string,
  rateLimit: RateLimitInfo,
): CatalogError {
  const excerpt = body ? `: ${truncate(body.trim(), BODY_EXCERPT)}` : "";
  switch (status) {
    case 400:
      return new ValidationError(
        `Entity API rejected the query for "${entityType}" (HTTP 400)${excerpt}. Check attribute names and filter syntax; generate_api_command shows valid examples`,
      );
    case 401:
    case 403:
      return new AuthenticationError(
        `Entity API refused the API key (HTTP ${status})${excerpt}. Check ENTITY_API_KEY`,
      );
    case 404:
      return new NotFoundError(
        `No entities of type "${entityType}" under service path "${servicePath}" (HTTP 404)${excerpt}. Check the entity type with list_saved_apis`,
      );
    case 429: {
      const wait = rateLimit.reset ? ` Retry after ${rateLimit.reset} seconds.` : " Retry later.";
      return new RateLimitError(`Entity API rate limit reached (HTTP 429).${wait}`);
    }
    default:
      return new FetchError(`Entity API returned HTTP ${status}${excerpt}`, status);
  }
}

/**
 * Live queries against the NGSI v2 entity endpoint. `execute` never throws:
 * every failure comes back as an `ok: false` result carrying its kind.
 */
export class EntityApiClient {
  private readonly nextTraceId: () => string;

  constructor(private readonly options: EntityApiClientOptions) {
    this.nextTraceId = options.traceId ?? randomUUID;
  }

  async execute(entityType: string, parameters: unknown, options: ExecuteOptions = {}): Promise<EntityQueryResult> {
    const servicePath = options.servicePath ?? defaultServicePath(entityType);
    const noQuery: Record<string, string> = {};
    const base = {
      entityType,
      servicePath,
      query: noQuery,
      traceId: null,
      status: null,
      rateLimit: NO_RATE_LIMIT,
      rateLimited: false,
    };

    if (!documentIdSchema.safeParse(entityType).success) {
      return {
        ...base,
        ok: false,
        error: toFailure(
          new ValidationError(`Invalid entity type "${entityType}"`, [
            "use letters, digits, '_', '.' or '-' and start with a letter or digit",
          ]),
        ),
      };
    }

    const parsed = queryParametersSchema.safeParse(parameters ?? {});
    if (!parsed.success) {
      return {
        ...base,
        ok: false,
        error: toFailure(new ValidationError("Invalid query parameters", [z.prettifyError(parsed.error)])),
      };
    }

    const query = buildEntityQuery(entityType, parsed.data);
    if (!this.options.apiKey) {
      return {
        ...base,
        query,
        ok: false,
        error: toFailure(new AuthenticationError("ENTITY_API_KEY is not configured; live queries need an API key")),
      };
    }

    const traceId = this.nextTraceId();
    const url = buildEntityUrl(this.options.baseUrl, query);
    const context = { ...base, query, traceId };

    log.info({ entityType, servicePath, traceId, query }, "Querying entity API");

    let response: Response;
    let body: string;
    try {
      response = await fetchWithRetry(url, {
        headers: buildEntityHeaders({
          apiKey: this.options.apiKey,
          fiwareService: this.options.fiwareService,
          servicePath,
          traceId,
        }),
        timeout: this.options.timeout,
        retries: 0,
      });
      body = await response.text();
    } catch (err) {
      const failure = toFailure(err);
      log.warn({ entityType, traceId, err }, "Entity API request failed");
      return {
        ...context,
        ok: false,
        error: failure.kind === "FetchError" ? failure : { kind: "FetchError", message: failure.message },
      };
    }

    const rateLimit = readRateLimit(response.headers);
    const rateLimited = response.status === 429 || rateLimit.remaining === "0";
    const settled = { ...context, status: response.status, rateLimit, rateLimited };

    if (!response.ok) {
      const error = errorForStatus(response.status, entityType, servicePath, body, rateLimit);
      log.warn({ entityType, traceId, status: response.status, kind: error.kind }, "Entity API returned an error");
      return {
        ...settled,
        ok: false,
        error: { ...toFailure(error), detail: truncate(body, BODY_EXCERPT) },
      };
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (err) {
      return {
        ...settled,
        ok: false,
        error: toFailure(new ParseError(`Entity API returned invalid JSON: ${truncate(body, 200)}`, { cause: err })),
      };
    }

    const records = Array.isArray(data) ? data.filter(isRecord) : isRecord(data) ? [data] : [];
    if (rateLimited) {
      log.warn({ entityType, traceId, rateLimit }, "Entity API rate limit exhausted");
    }
    return { ...settled, ok: true, records, summary: summarizeEntities(records) };
  }
}

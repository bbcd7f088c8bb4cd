import { USER_AGENT } from "../config/catalog.js";
import type { QueryParameters, RateLimitInfo } from "./types.js";

export function defaultServicePath(entityType: string): string {
  return `/${entityType}`;
}

/**
 * Maps validated parameters onto NGSI v2 query-string keys. `type` is always
 * present; every other key appears only when its parameter was given.
 */
export function buildEntityQuery(entityType: string, params: QueryParameters): Record<string, string> {
  const query: Record<string, string> = { type: entityType };

  if (params.id) query.id = params.id;
  if (params.idPattern) query.idPattern = params.idPattern;
  if (params.q) query.q = params.q;
  if (params.attrs) query.attrs = params.attrs.join(",");

  if (params.near) {
    query.georel = `near;maxDistance:${params.near.maxDistance}`;
    query.geometry = "point";
    query.coords = `${params.near.latitude},${params.near.longitude}`;
  } else if (params.spatial) {
    query.georel = params.spatial.georel;
    query.geometry = params.spatial.geometry;
    query.coords = params.spatial.coords;
  }

  if (params.limit !== undefined) query.limit = String(params.limit);
  if (params.offset !== undefined) query.offset = String(params.offset);
  if (params.orderBy) query.orderBy = params.orderBy;
  if (params.options) query.options = params.options;

  return query;
}

export interface HeaderInput {
  apiKey: string;
  fiwareService: string;
  servicePath: string;
  traceId: string;
}

export function buildEntityHeaders(input: HeaderInput): Record<string, string> {
  return {
    Accept: "application/json",
    apikey: input.apiKey,
    "Fiware-Service": input.fiwareService,
    "Fiware-ServicePath": input.servicePath,
    "x-request-trace-id": input.traceId,
    "User-Agent": USER_AGENT,
  };
}

export function buildEntityUrl(baseUrl: string, query: Record<string, string>): string {
  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

export function readRateLimit(headers: Headers): RateLimitInfo {
  return {
    remaining: headers.get("x-ratelimit-remaining-minute"),
    limit: headers.get("x-ratelimit-limit-minute"),
    reset: headers.get("ratelimit-reset"),
  };
}

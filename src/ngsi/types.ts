import { z } from "zod/v4";
import type { FailureKind } from "../errors.js";

/** NGSI v2 query options a caller may set; anything left out is not sent. */
export const queryParameterShape = {
  id: z.string().min(1).optional().describe("Exact entity id"),
  idPattern: z.string().min(1).optional().describe("Regular expression over entity ids"),
  q: z.string().min(1).optional().describe("Attribute filter in NGSI simple query language, e.g. 'Name~=.*港.*'"),
  attrs: z.array(z.string().min(1)).min(1).optional().describe("Attributes to return"),
  spatial: z
    .object({
      georel: z.string().min(1),
      geometry: z.enum(["point", "line", "polygon", "box"]),
      coords: z.string().min(1),
    })
    .optional()
    .describe("Raw NGSI geo query (georel/geometry/coords)"),
  near: z
    .object({
      latitude: z.number().min(-90).max(90),
      longitude: z.number().min(-180).max(180),
      maxDistance: z.number().int().positive(),
    })
    .optional()
    .describe("Entities within maxDistance metres of a point"),
  limit: z.number().int().min(1).max(1000).optional().describe("Page size (1-1000)"),
  offset: z.number().int().min(0).optional().describe("Entities to skip"),
  orderBy: z.string().min(1).optional().describe("Sort attribute; prefix with '!' for descending"),
  options: z.enum(["count", "keyValues", "values"]).optional().describe("NGSI response options"),
};

export const queryParametersSchema = z.strictObject(queryParameterShape).superRefine((params, ctx) => {
  if (params.spatial && params.near) {
    ctx.addIssue({ code: "custom", path: ["near"], message: "use either 'near' or 'spatial', not both" });
  }
  if (params.id && params.idPattern) {
    ctx.addIssue({ code: "custom", path: ["idPattern"], message: "use either 'id' or 'idPattern', not both" });
  }
});

export type QueryParameters = z.infer<typeof queryParametersSchema>;

/** An entity record as returned by the API; attribute values keep their upstream shape. */
export type NgsiEntity = Record<string, unknown>;

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface EntityDigest {
  id: string | null;
  type: string | null;
  name?: string;
  address?: string;
  location?: GeoPoint | string;
}

export interface EntitySummary {
  count: number;
  items: EntityDigest[];
}

/** Rate-limit headers copied verbatim; null when the response did not carry them. */
export interface RateLimitInfo {
  remaining: string | null;
  limit: string | null;
  reset: string | null;
}

interface QueryContext {
  entityType: string;
  servicePath: string;
  query: Record<string, string>;
  traceId: string | null;
  status: number | null;
  rateLimit: RateLimitInfo;
  rateLimited: boolean;
}

export type EntityQueryResult =
  | (QueryContext & { ok: true; records: NgsiEntity[]; summary: EntitySummary })
  | (QueryContext & { ok: false; error: { kind: FailureKind; message: string; detail?: string } });

export interface CommandExample {
  title: string;
  description: string;
  parameters: QueryParameters;
  query: Record<string, string>;
  headers: Record<string, string>;
  curl: string;
}

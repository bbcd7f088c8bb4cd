import { z } from "zod/v4";

/** Identifiers double as file names and entity types. */
export const DOCUMENT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

export const documentIdSchema = z.string().regex(DOCUMENT_ID_PATTERN, "must be alphanumeric, '_', '.' or '-'");

export const documentFieldSchema = z.enum(["description", "attributes", "endpoints"]);

export const attributeSchema = z.object({
  name: z.string().min(1),
  type: z.string(),
  description: z.string(),
  label: z.string().optional(),
});

export const endpointSchema = z.object({
  method: z.string().min(1),
  path: z.string().min(1),
  parameters: z.array(z.string()),
});

export const examplePayloadSchema = z.object({
  label: z.string(),
  body: jsonValueSchema,
});

export const completenessSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("complete") }),
  z.object({ status: z.literal("partial"), missing: z.array(documentFieldSchema).min(1) }),
]);

export const apiDocumentSchema = z.object({
  id: documentIdSchema,
  name: z.string().min(1),
  description: z.string(),
  attributes: z.array(attributeSchema),
  endpoints: z.array(endpointSchema),
  examples: z.array(examplePayloadSchema),
  servicePath: z.string().startsWith("/"),
  tags: z.array(z.string()),
  sourceUrl: z.string(),
  scrapedAt: z.string(),
  completeness: completenessSchema,
});

export const catalogIndexEntrySchema = z.object({
  name: z.string(),
  tags: z.array(z.string()),
});

export const indexFileSchema = z.object({
  generatedAt: z.string(),
  entries: z.record(z.string(), catalogIndexEntrySchema),
});

export const groupFileSchema = z.object({
  tag: z.string(),
  ids: z.array(documentIdSchema),
});

export type DocumentField = z.infer<typeof documentFieldSchema>;
export type Attribute = z.infer<typeof attributeSchema>;
export type Endpoint = z.infer<typeof endpointSchema>;
export type ExamplePayload = z.infer<typeof examplePayloadSchema>;
export type Completeness = z.infer<typeof completenessSchema>;
export type ApiDocument = z.infer<typeof apiDocumentSchema>;
export type CatalogIndexEntry = z.infer<typeof catalogIndexEntrySchema>;
/** id -> summary, keys in ascending order */
export type CatalogIndex = Record<string, CatalogIndexEntry>;
/** tag -> member ids */
export type Groupings = Record<string, string[]>;

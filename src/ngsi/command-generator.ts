import { sampleLocation } from "../config/catalog.js";
import type { DocumentStore } from "../store/document-store.js";
import type { ApiDocument, Attribute } from "../store/schema.js";
import { buildEntityHeaders, buildEntityQuery, buildEntityUrl } from "./query-builder.js";
import type { CommandExample, QueryParameters } from "./types.js";

export const API_KEY_PLACEHOLDER = "<YOUR_API_KEY>";
export const TRACE_ID_PLACEHOLDER = "<REQUEST_UUID>";

const LOCATION_PATTERN = /location|position|coordinates|geo|位置|座標|緯度/i;
const TEXT_TYPE_PATTERN = /text|string|文字/i;

export interface CommandTarget {
  entityApiUrl: string;
  fiwareService: string;
}

export interface CommandSet {
  document: ApiDocument;
  examples: CommandExample[];
}

function isLocation(attribute: Attribute): boolean {
  return [attribute.name, attribute.type, attribute.label ?? ""].some((text) => LOCATION_PATTERN.test(text));
}

function isText(attribute: Attribute): boolean {
  return TEXT_TYPE_PATTERN.test(attribute.type) || /^name$/i.test(attribute.name);
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function sampleEntityId(doc: ApiDocument): string {
  for (const example of doc.examples) {
    const body = Array.isArray(example.body) ? example.body[0] : example.body;
    if (typeof body === "object" && body !== null && !Array.isArray(body) && typeof body.id === "string") {
      return body.id;
    }
  }
  return `urn:ngsi-ld:${doc.id}:001`;
}

function buildExample(
  doc: ApiDocument,
  target: CommandTarget,
  title: string,
  description: string,
  parameters: QueryParameters,
): CommandExample {
  const query = buildEntityQuery(doc.id, parameters);
  const headers = buildEntityHeaders({
    apiKey: API_KEY_PLACEHOLDER,
    fiwareService: target.fiwareService,
    servicePath: doc.servicePath,
    traceId: TRACE_ID_PLACEHOLDER,
  });
  const curl = [
    `curl ${shellQuote(buildEntityUrl(target.entityApiUrl, query))}`,
    ...Object.entries(headers).map(([name, value]) => `-H ${shellQuote(`${name}: ${value}`)}`),
  ].join(" \\\n  ");

  return { title, description, parameters, query, headers, curl };
}

/**
 * Example queries for a cached API, derived only from its document. Makes no
 * network call; the API key appears as {@link API_KEY_PLACEHOLDER}.
 */
export function generateCommands(doc: ApiDocument, target: CommandTarget): CommandExample[] {
  const examples: CommandExample[] = [
    buildExample(doc, target, "Basic query", `First 10 ${doc.name} entities`, { limit: 10 }),
    buildExample(doc, target, "Query by id", "Fetch a single entity by its id", { id: sampleEntityId(doc) }),
  ];

  const location = doc.attributes.find(isLocation);
  if (location) {
    examples.push(
      buildExample(
        doc,
        target,
        "Geographic query",
        `Entities within ${sampleLocation.maxDistance}m of a point (${location.name})`,
        { near: { ...sampleLocation }, limit: 20 },
      ),
    );
  }

  const text = doc.attributes.find((a) => isText(a) && !isLocation(a));
  if (text) {
    examples.push(
      buildExample(doc, target, "Attribute filter", `Entities whose ${text.name} is set`, {
        q: `${text.name}~=.+`,
        attrs: [text.name],
        limit: 10,
      }),
    );
  }

  const sortable = doc.attributes.find((a) => !isLocation(a));
  const counted: QueryParameters = { limit: 100, options: "count" };
  if (sortable) counted.orderBy = sortable.name;
  examples.push(
    buildExample(
      doc,
      target,
      "Count and sort",
      sortable ? `Total count in the response headers, sorted by ${sortable.name}` : "Total count in the response headers",
      counted,
    ),
  );

  return examples;
}

/** Looks up the cached document; a missing one raises NotFoundError from the store. */
export async function generateCommand(
  store: DocumentStore,
  entityType: string,
  target: CommandTarget,
): Promise<CommandSet> {
  const document = await store.load(entityType);
  return { document, examples: generateCommands(document, target) };
}

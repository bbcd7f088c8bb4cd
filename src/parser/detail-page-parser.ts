import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { createChildLogger } from "../utils/logger.js";
import { attributeHeaders, catalogLayout } from "../config/catalog.js";
import { ParseError } from "../errors.js";
import { classify } from "./classifier.js";
import {
  jsonValueSchema,
  type ApiDocument,
  type Attribute,
  type DocumentField,
  type Endpoint,
  type ExamplePayload,
  type JsonValue,
} from "../store/schema.js";
import type { CatalogLink } from "./index-page-parser.js";

const log = createChildLogger("detail-page-parser");

const ENDPOINT_PATTERN = /^(GET|POST|PUT|PATCH|DELETE|HEAD|OPTIONS)?\s*(\S+)$/i;
const SERVICE_PATH_PATTERN = /Fiware-ServicePath\s*[:：]\s*(\/[^\s"'<>]*)/i;

interface AttributeColumns {
  name: number;
  label: number;
  type: number;
  description: number;
}

function resolveColumns(headers: string[]): AttributeColumns | null {
  let label = headers.findIndex((h) => attributeHeaders.label.test(h));
  let name = headers.findIndex((h, i) => i !== label && attributeHeaders.name.test(h));
  if (name < 0) {
    if (label < 0) return null;
    // a lone display-name column is the attribute name
    name = label;
    label = -1;
  }
  const taken = [name, label];
  const type = headers.findIndex((h, i) => !taken.includes(i) && attributeHeaders.type.test(h));
  const description = headers.findIndex(
    (h, i) => !taken.includes(i) && i !== type && attributeHeaders.description.test(h),
  );
  return { name, label, type, description };
}

function extractAttributes($: CheerioAPI): Attribute[] {
  const attributes: Attribute[] = [];
  const seen = new Set<string>();

  $("table").each((_, table) => {
    const rows = $(table).find("tr");
    const headers = rows
      .first()
      .find("th, td")
      .map((_, cell) => $(cell).text().trim())
      .get();
    const columns = resolveColumns(headers);
    if (!columns) return;

    rows.slice(1).each((_, row) => {
      const cells = $(row)
        .find("td, th")
        .map((_, cell) => $(cell).text().trim())
        .get();
      const cell = (index: number): string => (index >= 0 ? cells[index] ?? "" : "");

      const name = cell(columns.name);
      if (!name || seen.has(name)) return;
      seen.add(name);

      const attribute: Attribute = {
        name,
        type: cell(columns.type),
        description: cell(columns.description),
      };
      const label = cell(columns.label);
      if (label) attribute.label = label;
      attributes.push(attribute);
    });
  });

  return attributes;
}

export function parseEndpoint(text: string): Endpoint | null {
  const match = text.replace(/\s+/g, " ").trim().match(ENDPOINT_PATTERN);
  if (!match) return null;

  const [target, query = ""] = match[2].split("?", 2);
  if (!target.startsWith("/") && !/^https?:\/\//i.test(target)) return null;

  return {
    method: (match[1] ?? "GET").toUpperCase(),
    path: target,
    parameters: [...new Set(new URLSearchParams(query).keys())],
  };
}

function extractEndpoints($: CheerioAPI): Endpoint[] {
  const endpoints: Endpoint[] = [];
  const seen = new Set<string>();

  $(catalogLayout.endpointSelector).each((_, el) => {
    const endpoint = parseEndpoint($(el).text());
    if (!endpoint) return;
    const key = `${endpoint.method} ${endpoint.path}`;
    if (seen.has(key)) return;
    seen.add(key);
    endpoints.push(endpoint);
  });

  return endpoints;
}

function parseExampleBody(text: string): JsonValue {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return text;
  }
  const parsed = jsonValueSchema.safeParse(data);
  return parsed.success ? parsed.data : text;
}

function extractExamples($: CheerioAPI): ExamplePayload[] {
  const examples: ExamplePayload[] = [];
  const seen = new Set<string>();

  $(catalogLayout.exampleSelector).each((_, el) => {
    const text = $(el).text().trim();
    if (!text || seen.has(text)) return;
    seen.add(text);

    let label = $(el).attr("data-label")?.trim() ?? "";
    for (const host of [$(el).closest("pre"), $(el).closest(".example")]) {
      if (label) break;
      label = host.prevAll("h2, h3, h4").first().text().trim();
    }

    examples.push({ label: label || `Example ${examples.length + 1}`, body: parseExampleBody(text) });
  });

  return examples;
}

function extractServicePath($: CheerioAPI): string | null {
  const attr = catalogLayout.servicePathAttribute;
  const fromAttribute = $(`[${attr}]`).first().attr(attr)?.trim();
  if (fromAttribute?.startsWith("/")) return fromAttribute;

  const match = $("body").text().match(SERVICE_PATH_PATTERN);
  return match ? match[1] : null;
}

/** Runs one extractor; a throw marks the section as missing instead of failing the page. */
function section<T>(url: string, field: string, extract: () => T): T | null {
  try {
    return extract();
  } catch (err) {
    log.warn({ url, field, err }, "Section extraction failed");
    return null;
  }
}

/**
 * Turns an API detail page into a document. Sections that are absent or fail
 * to parse leave the document partial; a page with no heading, attribute
 * table or endpoint at all is not an API page and raises {@link ParseError}.
 */
export function parseDetailPage(html: string, link: CatalogLink, scrapedAt: Date): ApiDocument {
  let $: CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch (err) {
    throw new ParseError(`Detail page for "${link.id}" could not be loaded`, { cause: err });
  }

  const heading = section(link.url, "name", () => $("h1").first().text().trim()) ?? "";
  const attributes = section(link.url, "attributes", () => extractAttributes($)) ?? [];
  const endpoints = section(link.url, "endpoints", () => extractEndpoints($)) ?? [];

  if (!heading && attributes.length === 0 && endpoints.length === 0) {
    throw new ParseError(`Detail page for "${link.id}" has no API heading, attribute table or endpoint`);
  }

  const description =
    section(link.url, "description", () => {
      const explicit = $(catalogLayout.descriptionSelector).first().text().trim();
      return explicit || $("h1").first().nextAll("p").first().text().trim();
    }) || link.description;
  const examples = section(link.url, "examples", () => extractExamples($)) ?? [];
  const servicePath = section(link.url, "servicePath", () => extractServicePath($)) ?? `/${link.id}`;

  const missing: DocumentField[] = [];
  if (!description) missing.push("description");
  if (attributes.length === 0) missing.push("attributes");
  if (endpoints.length === 0) missing.push("endpoints");

  const name = heading || link.title;
  return {
    id: link.id,
    name,
    description,
    attributes,
    endpoints,
    examples,
    servicePath,
    tags: classify({ id: link.id, name, description, attributes }),
    sourceUrl: link.url,
    scrapedAt: scrapedAt.toISOString(),
    completeness: missing.length === 0 ? { status: "complete" } : { status: "partial", missing },
  };
}

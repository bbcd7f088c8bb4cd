import type { ApiDocument, CatalogIndex } from "../store/schema.js";
import type { StoreStats } from "../store/document-store.js";
import type { ScrapeRun } from "../crawler/index.js";
import type { CommandSet } from "../ngsi/command-generator.js";
import type { EntityQueryResult } from "../ngsi/types.js";
import type { Failure } from "../errors.js";
import { truncate } from "../utils/text.js";

const RESPONSE_EXCERPT = 4000;
const SUMMARY_ITEMS = 5;

function completenessLabel(doc: ApiDocument): string {
  return doc.completeness.status === "complete"
    ? "complete"
    : `partial (missing: ${doc.completeness.missing.join(", ")})`;
}

function fence(language: string, text: string): string {
  return `\`\`\`${language}\n${text}\n\`\`\``;
}

export function formatFailure(failure: Failure): string {
  return `**${failure.kind}**: ${failure.message}`;
}

export function formatScrapeRun(run: ScrapeRun): string {
  const { summary, saved } = run;
  const lines = [
    `## Catalog scrape complete`,
    `**APIs stored**: ${summary.scraped} (${summary.partial} partial)`,
    `**Detail pages skipped**: ${summary.skipped}`,
    `**Index links skipped**: ${summary.skippedLinks}`,
    `**Files written**: ${saved.files.length}`,
  ];

  const tags = Object.entries(summary.tagDistribution);
  if (tags.length > 0) {
    lines.push(`\n### Tags`);
    for (const [tag, count] of tags) {
      lines.push(`- ${tag}: ${count}`);
    }
  }

  if (summary.errors.length > 0) {
    lines.push(`\n### Errors`);
    for (const error of summary.errors) {
      lines.push(`- ${error}`);
    }
  }

  return lines.join("\n");
}

export function formatSearchResults(keyword: string, docs: ApiDocument[]): string {
  if (docs.length === 0) {
    return `No APIs match "${keyword}". Try a broader keyword, or run scrape_api_docs if the cache is empty.`;
  }

  const items = docs.map((doc) => {
    const tags = doc.tags.length > 0 ? ` [${doc.tags.join(", ")}]` : "";
    return `- **${doc.name}**${tags}\n  ${truncate(doc.description || "No description", 200)}\n  Id: \`${doc.id}\``;
  });
  return `Found ${docs.length} APIs matching "${keyword}":\n\n${items.join("\n\n")}`;
}

export function formatDocument(doc: ApiDocument): string {
  const lines = [
    `# ${doc.name}`,
    doc.description ? `\n${doc.description}` : "",
    `\n**Id**: \`${doc.id}\``,
    `**Service path**: \`${doc.servicePath}\``,
    doc.tags.length > 0 ? `**Tags**: ${doc.tags.join(", ")}` : "",
    `**Source**: ${doc.sourceUrl}`,
    `**Scraped at**: ${doc.scrapedAt}`,
    `**Completeness**: ${completenessLabel(doc)}`,
  ];

  if (doc.attributes.length > 0) {
    lines.push(`\n## Attributes (${doc.attributes.length})`);
    lines.push(`| Name | Label | Type | Description |`, `| --- | --- | --- | --- |`);
    for (const a of doc.attributes) {
      lines.push(`| ${a.name} | ${a.label ?? ""} | ${a.type} | ${a.description} |`);
    }
  }

  if (doc.endpoints.length > 0) {
    lines.push(`\n## Endpoints (${doc.endpoints.length})`);
    for (const e of doc.endpoints) {
      const params = e.parameters.length > 0 ? ` (parameters: ${e.parameters.join(", ")})` : "";
      lines.push(`- \`${e.method} ${e.path}\`${params}`);
    }
  }

  if (doc.examples.length > 0) {
    lines.push(`\n## Examples (${doc.examples.length})`);
    for (const example of doc.examples) {
      const body = typeof example.body === "string" ? example.body : JSON.stringify(example.body, null, 2);
      lines.push(`\n### ${example.label}`, fence("json", body));
    }
  }

  return lines.filter(Boolean).join("\n");
}

export function formatCatalogIndex(index: CatalogIndex): string {
  const ids = Object.keys(index);
  if (ids.length === 0) {
    return "No APIs are cached yet. Run scrape_api_docs to fetch the catalog.";
  }

  const items = ids.map((id) => {
    const entry = index[id];
    const tags = entry.tags.length > 0 ? ` [${entry.tags.join(", ")}]` : "";
    return `- **${entry.name}** (\`${id}\`)${tags}`;
  });
  return `## Cached APIs (${ids.length})\n\n${items.join("\n")}`;
}

export function formatDocumentList(title: string, docs: ApiDocument[]): string {
  if (docs.length === 0) {
    return `## ${title}\n\nNo APIs in this group. Run scrape_api_docs to refresh the catalog.`;
  }
  const items = docs.map((doc) => {
    const attrs = doc.attributes.map((a) => a.name).join(", ");
    return `### ${doc.name} (\`${doc.id}\`)\n${doc.description || "No description"}\n\nService path: \`${doc.servicePath}\`${attrs ? `\nAttributes: ${attrs}` : ""}`;
  });
  return `## ${title} (${docs.length})\n\n${items.join("\n\n")}`;
}

export function formatStatus(stats: StoreStats, dataDir: string): string {
  return [
    `## City API catalog status`,
    `**Data directory**: \`${dataDir}\``,
    `**Cached APIs**: ${stats.documents}`,
    `**Groups**: ${stats.groups.length > 0 ? stats.groups.join(", ") : "none"}`,
    `**Last scraped**: ${stats.lastScrapedAt ?? "never"}`,
    `\n### Usage`,
    `1. \`scrape_api_docs\` refreshes the cache from the catalog site`,
    `2. \`list_saved_apis\` lists what is cached`,
    `3. \`search_api_docs\` finds APIs by keyword`,
    `4. \`get_api_details\` shows one API`,
    `5. \`generate_api_command\` and \`execute_entity_query\` build and run entity queries`,
  ].join("\n");
}

export function formatCommands(set: CommandSet): string {
  const lines = [`# Query examples for ${set.document.name} (\`${set.document.id}\`)`];
  for (const example of set.examples) {
    lines.push(
      `\n## ${example.title}`,
      example.description,
      `\n**Query**:`,
      fence("json", JSON.stringify(example.query, null, 2)),
      fence("bash", example.curl),
    );
  }
  lines.push(`\nReplace \`<YOUR_API_KEY>\` with the key issued for the entity API.`);
  return lines.join("\n");
}

export function formatQueryResult(result: EntityQueryResult): string {
  const lines = [
    `# Entity query: \`${result.entityType}\``,
    `**Service path**: \`${result.servicePath}\``,
    `**Status**: ${result.status ?? "no response"}`,
    `**Rate limit remaining**: ${result.rateLimit.remaining ?? "n/a"}${result.rateLimit.reset ? ` (reset: ${result.rateLimit.reset})` : ""}`,
  ];
  if (result.traceId) lines.push(`**Trace id**: \`${result.traceId}\``);
  if (Object.keys(result.query).length > 0) {
    lines.push(`\n**Query**:`, fence("json", JSON.stringify(result.query, null, 2)));
  }
  if (result.rateLimited) {
    lines.push(`\nRate limit exhausted; wait for the reset before the next query.`);
  }

  if (!result.ok) {
    lines.push(`\n${formatFailure(result.error)}`);
    return lines.join("\n");
  }

  lines.push(`\n**Entities returned**: ${result.summary.count}`);
  for (const item of result.summary.items.slice(0, SUMMARY_ITEMS)) {
    const location =
      typeof item.location === "string"
        ? item.location
        : item.location
          ? `${item.location.latitude},${item.location.longitude}`
          : "";
    const details = [item.address, location].filter(Boolean).join(" ");
    lines.push(`- **${item.name ?? item.id ?? "unnamed"}**${details ? `: ${details}` : ""}\n  Id: \`${item.id ?? "n/a"}\``);
  }
  if (result.summary.count > SUMMARY_ITEMS) {
    lines.push(`- ... ${result.summary.count - SUMMARY_ITEMS} more`);
  }

  lines.push(`\n**Response**:`, fence("json", truncate(JSON.stringify(result.records, null, 2), RESPONSE_EXCERPT)));
  return lines.join("\n");
}

export const CATALOG_INFO = [
  `# City API catalog MCP server`,
  ``,
  `Caches the municipal open-data API catalog locally and queries the city's`,
  `NGSI v2 entity API (FIWARE context broker).`,
  ``,
  `## Tools`,
  `- \`scrape_api_docs\`: log into the catalog site and refresh the local cache`,
  `- \`search_api_docs\`: keyword search over cached APIs`,
  `- \`get_api_details\`: one cached API with attributes, endpoints and examples`,
  `- \`list_saved_apis\`: every cached API with its tags`,
  `- \`generate_api_command\`: ready-to-run query examples for an entity type`,
  `- \`execute_entity_query\`: run a live query against the entity API`,
  ``,
  `## Entity API headers`,
  `- \`apikey\`: issued API key`,
  `- \`Fiware-Service\`: tenant name`,
  `- \`Fiware-ServicePath\`: \`/<entity type>\` unless the catalog says otherwise`,
].join("\n");

import { createChildLogger } from "../utils/logger.js";
import { groupByTag } from "../parser/classifier.js";
import type { CatalogError } from "../errors.js";
import type { ApiDocument, Groupings } from "../store/schema.js";

export type CrawlResult =
  | { status: "scraped"; document: ApiDocument }
  | { status: "skipped"; id: string; url: string; error: CatalogError }
  | { status: "link-skipped"; href: string | null; reason: string };

export interface ScrapeSummary {
  scraped: number;
  partial: number;
  skipped: number;
  skippedLinks: number;
  tagDistribution: Record<string, number>;
  errors: string[];
}

export interface ScrapeOutcome {
  documents: ApiDocument[];
  groupings: Groupings;
  summary: ScrapeSummary;
}

/**
 * Drains a crawl and aggregates it. Per-item failures arrive as results and
 * are counted; an error thrown by `crawl` itself (login, index fetch) aborts
 * the run.
 */
export abstract class BaseCrawler<TInput> {
  protected log;

  constructor(public readonly name: string) {
    this.log = createChildLogger(`crawler:${name}`);
  }

  abstract crawl(input: TInput): AsyncGenerator<CrawlResult>;

  async run(input: TInput): Promise<ScrapeOutcome> {
    const summary: ScrapeSummary = {
      scraped: 0,
      partial: 0,
      skipped: 0,
      skippedLinks: 0,
      tagDistribution: {},
      errors: [],
    };
    const byId = new Map<string, ApiDocument>();

    this.log.info("Starting crawl");

    try {
      for await (const result of this.crawl(input)) {
        switch (result.status) {
          case "scraped":
            byId.set(result.document.id, result.document);
            this.log.debug({ id: result.document.id }, "Processed API");
            break;
          case "skipped":
            summary.skipped++;
            summary.errors.push(`${result.id}: ${result.error.message}`);
            break;
          case "link-skipped":
            summary.skippedLinks++;
            summary.errors.push(`link ${result.href ?? "(none)"}: ${result.reason}`);
            break;
        }
      }
    } catch (err) {
      this.log.error({ err }, "Crawl failed");
      throw err;
    }

    const documents = [...byId.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    for (const doc of documents) {
      summary.scraped++;
      if (doc.completeness.status === "partial") summary.partial++;
      for (const tag of doc.tags) {
        summary.tagDistribution[tag] = (summary.tagDistribution[tag] ?? 0) + 1;
      }
    }
    summary.tagDistribution = Object.fromEntries(
      Object.entries(summary.tagDistribution).sort(([a], [b]) => (a < b ? -1 : 1)),
    );

    this.log.info(summary, "Crawl complete");
    return { documents, groupings: groupByTag(documents), summary };
  }
}

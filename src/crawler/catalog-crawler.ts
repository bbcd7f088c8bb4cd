import { BaseCrawler, type CrawlResult, type ScrapeOutcome } from "./base-crawler.js";
import { login, type CatalogCredentials, type CatalogSession } from "./catalog-session.js";
import { fetchText } from "../utils/http-client.js";
import { createLimiter } from "../utils/concurrency.js";
import type { TokenBucketRateLimiter } from "../utils/rate-limiter.js";
import { parseIndexPage, type CatalogLink } from "../parser/index-page-parser.js";
import { parseDetailPage } from "../parser/detail-page-parser.js";
import { CatalogError, FetchError, errorMessage } from "../errors.js";

export interface CatalogScraperOptions {
  baseUrl: string;
  /** Detail pages fetched at once. */
  concurrency?: number;
  rateLimiter?: TokenBucketRateLimiter;
  timeout?: number;
  retries?: number;
  clock?: () => Date;
}

export class CatalogScraper extends BaseCrawler<CatalogCredentials> {
  constructor(private readonly options: CatalogScraperOptions) {
    super("catalog");
  }

  /** Logs in, walks the index and every detail page, and returns the documents without storing them. */
  scrapeCatalog(credentials: CatalogCredentials): Promise<ScrapeOutcome> {
    return this.run(credentials);
  }

  async *crawl(credentials: CatalogCredentials): AsyncGenerator<CrawlResult> {
    const session = await login(credentials, {
      baseUrl: this.options.baseUrl,
      timeout: this.options.timeout,
      retries: this.options.retries,
    });

    const { links, skipped } = parseIndexPage(session.indexHtml, session.catalogUrl, session.catalogUrl);
    this.log.info({ links: links.length, skippedLinks: skipped.length }, "Parsed catalog index");

    for (const entry of skipped) {
      yield { status: "link-skipped", href: entry.href, reason: entry.reason };
    }

    const limit = createLimiter(this.options.concurrency ?? 4);
    const scrapedAt = this.options.clock ? this.options.clock() : new Date();

    // every task is started before the first is awaited; the limiter bounds the fan-out
    const tasks = links.map((link) => limit(() => this.scrapeDetail(link, session, scrapedAt)));
    for (const task of tasks) {
      yield await task;
    }
  }

  private async scrapeDetail(link: CatalogLink, session: CatalogSession, scrapedAt: Date): Promise<CrawlResult> {
    try {
      const html = await fetchText(link.url, {
        headers: session.headers,
        rateLimiter: this.options.rateLimiter,
        timeout: this.options.timeout,
        retries: this.options.retries,
      });
      return { status: "scraped", document: parseDetailPage(html, link, scrapedAt) };
    } catch (err) {
      const error =
        err instanceof CatalogError
          ? err
          : new FetchError(`Reading ${link.url} failed: ${errorMessage(err)}`, null, { cause: err });
      this.log.warn({ id: link.id, url: link.url, kind: error.kind, err }, "Skipping API detail page");
      return { status: "skipped", id: link.id, url: link.url, error };
    }
  }
}

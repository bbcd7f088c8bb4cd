import { createChildLogger } from "../utils/logger.js";
import { TokenBucketRateLimiter } from "../utils/rate-limiter.js";
import type { AppConfig } from "../config/index.js";
import type { DocumentStore, SaveResult } from "../store/document-store.js";
import type { ScrapeSummary } from "./base-crawler.js";
import { CatalogScraper } from "./catalog-crawler.js";
import type { CatalogCredentials } from "./catalog-session.js";

const log = createChildLogger("crawler-orchestrator");

export interface ScrapeRun {
  summary: ScrapeSummary;
  saved: SaveResult;
}

export function createCatalogScraper(config: AppConfig): CatalogScraper {
  return new CatalogScraper({
    baseUrl: config.CATALOG_BASE_URL,
    concurrency: config.SCRAPE_CONCURRENCY,
    rateLimiter: TokenBucketRateLimiter.perMinute(config.CATALOG_REQUESTS_PER_MINUTE),
    timeout: config.HTTP_TIMEOUT_MS,
    retries: config.HTTP_RETRIES,
  });
}

export function credentialsFrom(config: AppConfig): CatalogCredentials {
  return { email: config.CATALOG_EMAIL, password: config.CATALOG_PASSWORD };
}

/** Scrapes the catalog, then hands the documents and tag groups to the store. */
export async function runCatalogScrape(
  scraper: CatalogScraper,
  store: DocumentStore,
  credentials: CatalogCredentials,
): Promise<ScrapeRun> {
  const outcome = await scraper.scrapeCatalog(credentials);
  const saved = await store.save(outcome.documents, outcome.groupings);

  log.info({ dir: store.dir, summary: outcome.summary, files: saved.files.length }, "Catalog scrape stored");
  return { summary: outcome.summary, saved };
}

export { BaseCrawler } from "./base-crawler.js";
export type { CrawlResult, ScrapeOutcome, ScrapeSummary } from "./base-crawler.js";
export { CatalogScraper } from "./catalog-crawler.js";
export { login, type CatalogCredentials, type CatalogSession } from "./catalog-session.js";

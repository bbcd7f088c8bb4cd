import { config } from "../src/config/index.js";
import { createCatalogScraper, credentialsFrom, runCatalogScrape } from "../src/crawler/index.js";
import { DocumentStore } from "../src/store/document-store.js";
import { logger } from "../src/utils/logger.js";

// --dry-run scrapes and reports without touching the cache
const dryRun = process.argv.includes("--dry-run");

async function main() {
  const scraper = createCatalogScraper(config);
  const credentials = credentialsFrom(config);

  if (dryRun) {
    logger.info({ baseUrl: config.CATALOG_BASE_URL }, "Running dry-run scrape");
    const outcome = await scraper.scrapeCatalog(credentials);
    logger.info({ summary: outcome.summary, ids: outcome.documents.map((d) => d.id) }, "Dry run complete");
  } else {
    const store = new DocumentStore(config.DATA_DIR);
    logger.info({ baseUrl: config.CATALOG_BASE_URL, dataDir: store.dir }, "Running catalog scrape");
    const run = await runCatalogScrape(scraper, store, credentials);
    logger.info({ summary: run.summary, files: run.saved.files.length }, "Scrape complete");
  }
  process.exit(0);
}

main().catch((err) => {
  logger.fatal({ err }, "Scrape script failed");
  process.exit(1);
});

import type { AppConfig } from "./config/index.js";
import { DocumentStore } from "./store/document-store.js";
import { EntityApiClient } from "./ngsi/entity-client.js";
import type { CommandTarget } from "./ngsi/command-generator.js";
import {
  createCatalogScraper,
  credentialsFrom,
  runCatalogScrape,
  type ScrapeRun,
} from "./crawler/index.js";

/** Everything an MCP tool, resource or HTTP route needs, built once per process. */
export interface AppContext {
  config: AppConfig;
  store: DocumentStore;
  entityClient: EntityApiClient;
  commandTarget: CommandTarget;
  scrape(): Promise<ScrapeRun>;
}

export function createAppContext(config: AppConfig): AppContext {
  const store = new DocumentStore(config.DATA_DIR);

  return {
    config,
    store,
    entityClient: new EntityApiClient({
      baseUrl: config.ENTITY_API_URL,
      apiKey: config.ENTITY_API_KEY || undefined,
      fiwareService: config.FIWARE_SERVICE,
      timeout: config.HTTP_TIMEOUT_MS,
    }),
    commandTarget: { entityApiUrl: config.ENTITY_API_URL, fiwareService: config.FIWARE_SERVICE },
    scrape: () => runCatalogScrape(createCatalogScraper(config), store, credentialsFrom(config)),
  };
}

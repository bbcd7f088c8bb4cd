import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { vi } from "vitest";
import { parseConfig, type AppConfig } from "../src/config/index.js";
import type { AppContext } from "../src/context.js";
import { DocumentStore } from "../src/store/document-store.js";
import { EntityApiClient } from "../src/ngsi/entity-client.js";
import type { ApiDocument } from "../src/store/schema.js";

export const TEST_BASE_URL = "https://catalog.test/city";
export const TEST_ENTITY_URL = "https://entities.test/v2/entities";

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "city-catalog-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export function makeDocument(overrides: Partial<ApiDocument> & { id: string }): ApiDocument {
  return {
    name: overrides.id,
    description: "",
    attributes: [],
    endpoints: [],
    examples: [],
    servicePath: `/${overrides.id}`,
    tags: [],
    sourceUrl: `${TEST_BASE_URL}/catalog/${overrides.id}`,
    scrapedAt: "2026-01-01T00:00:00.000Z",
    completeness: { status: "complete" },
    ...overrides,
  };
}

export type RouteHandler = (url: URL, init: RequestInit | undefined) => Response | Promise<Response>;

/**
 * In-process stand-in for global fetch. Routes are keyed by origin + path;
 * an unknown URL answers 599 so a test fails loudly instead of hanging.
 */
export function stubFetch(routes: Record<string, RouteHandler>) {
  const calls: Array<{ url: string; headers: Headers }> = [];

  const fake = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    calls.push({ url: url.toString(), headers: new Headers(init?.headers) });
    const handler = routes[`${url.origin}${url.pathname}`];
    if (!handler) {
      return new Response(`no route for ${url.toString()}`, { status: 599 });
    }
    return handler(url, init);
  });

  vi.stubGlobal("fetch", fake);
  return { fake, calls };
}

export function html(body: string, init: ResponseInit = {}): Response {
  return new Response(`<!doctype html><html><body>${body}</body></html>`, {
    status: 200,
    headers: { "content-type": "text/html; charset=utf-8" },
    ...init,
  });
}

export function json(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return parseConfig({
    NODE_ENV: "test",
    LOG_LEVEL: "silent",
    CATALOG_BASE_URL: TEST_BASE_URL,
    CATALOG_EMAIL: "tester@example.com",
    CATALOG_PASSWORD: "test-secret",
    ENTITY_API_URL: TEST_ENTITY_URL,
    ENTITY_API_KEY: "test-api-key",
    ADMIN_API_KEY: "test-admin-key",
    CATALOG_REQUESTS_PER_MINUTE: "6000",
    HTTP_RETRIES: "0",
    ...overrides,
  });
}

export function testContext(store: DocumentStore, overrides: Partial<AppContext> = {}): AppContext {
  const config = testConfig({ DATA_DIR: store.dir });
  return {
    config,
    store,
    entityClient: new EntityApiClient({
      baseUrl: TEST_ENTITY_URL,
      apiKey: "test-api-key",
      fiwareService: "test_city",
      traceId: () => "trace-1",
    }),
    commandTarget: { entityApiUrl: TEST_ENTITY_URL, fiwareService: "test_city" },
    scrape: vi.fn(async () => {
      throw new Error("scrape not stubbed");
    }),
    ...overrides,
  };
}

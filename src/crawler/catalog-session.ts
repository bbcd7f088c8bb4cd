import * as cheerio from "cheerio";
import { createChildLogger } from "../utils/logger.js";
import { discardBody, fetchWithRetry } from "../utils/http-client.js";
import { catalogLayout, USER_AGENT } from "../config/catalog.js";
import { AuthenticationError, FetchError } from "../errors.js";

const log = createChildLogger("catalog-session");

export interface CatalogCredentials {
  email: string;
  password: string;
}

export interface CatalogSession {
  /** Headers replayed on every later catalog request. */
  headers: Record<string, string>;
  catalogUrl: string;
  /** The catalog page returned by the login request; it is the API index. */
  indexHtml: string;
}

export interface LoginOptions {
  baseUrl: string;
  timeout?: number;
  retries?: number;
}

export function catalogUrlFor(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, "")}${catalogLayout.catalogPath}`;
}

/**
 * Opens the catalog page with Basic credentials. The catalog answers a bad
 * login with 401/403 or by serving its login form; both raise
 * {@link AuthenticationError}. Any other failure to get the page is a
 * {@link FetchError}.
 */
export async function login(credentials: CatalogCredentials, options: LoginOptions): Promise<CatalogSession> {
  if (!credentials.email || !credentials.password) {
    throw new AuthenticationError(
      "Catalog credentials are not configured. Set CATALOG_EMAIL and CATALOG_PASSWORD.",
    );
  }

  const catalogUrl = catalogUrlFor(options.baseUrl);
  const encoded = Buffer.from(`${credentials.email}:${credentials.password}`).toString("base64");
  const headers: Record<string, string> = {
    Authorization: `Basic ${encoded}`,
    Accept: "text/html,application/json",
    "User-Agent": USER_AGENT,
  };

  log.info({ url: catalogUrl, email: credentials.email }, "Logging in to API catalog");

  const response = await fetchWithRetry(catalogUrl, {
    headers,
    timeout: options.timeout,
    retries: options.retries,
  });

  if (response.status === 401 || response.status === 403) {
    await discardBody(response);
    throw new AuthenticationError(
      `Catalog rejected the credentials (HTTP ${response.status}). Check CATALOG_EMAIL and CATALOG_PASSWORD.`,
    );
  }
  if (!response.ok) {
    await discardBody(response);
    throw new FetchError(`HTTP ${response.status} for ${catalogUrl}: ${response.statusText}`, response.status);
  }

  const indexHtml = await response.text();
  if (cheerio.load(indexHtml)("input[type=password]").length > 0) {
    throw new AuthenticationError("Catalog answered with its login form; the credentials were not accepted.");
  }

  const cookie = response.headers
    .getSetCookie()
    .map((value) => value.split(";")[0].trim())
    .filter(Boolean)
    .join("; ");
  if (cookie) {
    headers.Cookie = cookie;
  }

  log.info({ url: catalogUrl, cookies: cookie ? cookie.split("; ").length : 0 }, "Catalog login succeeded");
  return { headers, catalogUrl, indexHtml };
}

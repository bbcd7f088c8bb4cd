import * as cheerio from "cheerio";
import { catalogLayout } from "../config/catalog.js";
import { DOCUMENT_ID_PATTERN } from "../store/schema.js";

export interface CatalogLink {
  id: string;
  url: string;
  /** Card text, used when the detail page lacks a heading or description. */
  title: string;
  description: string;
}

export interface SkippedLink {
  href: string | null;
  reason: string;
}

export interface IndexPage {
  links: CatalogLink[];
  skipped: SkippedLink[];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Collects one detail link per API card on the catalog index page. A card
 * whose link is missing, unresolvable or outside `<catalog>/<id>` is reported
 * in `skipped`; a second card for an id already seen is ignored.
 */
export function parseIndexPage(html: string, pageUrl: string, catalogUrl: string): IndexPage {
  const $ = cheerio.load(html);
  const catalog = new URL(catalogUrl);
  const detailPath = new RegExp(`^${escapeRegExp(catalog.pathname.replace(/\/$/, ""))}/([^/]+)/?$`);

  const links: CatalogLink[] = [];
  const skipped: SkippedLink[] = [];
  const seen = new Set<string>();

  $(catalogLayout.cardSelector).each((_, card) => {
    const anchor = $(card).find("a[href]").first();
    const href = anchor.attr("href")?.trim() || null;
    if (!href) {
      skipped.push({ href: null, reason: "card has no link" });
      return;
    }

    let url: URL;
    try {
      url = new URL(href, pageUrl);
    } catch {
      skipped.push({ href, reason: "unparseable link" });
      return;
    }

    const match = url.origin === catalog.origin ? url.pathname.match(detailPath) : null;
    if (!match) {
      skipped.push({ href, reason: "not a catalog detail link" });
      return;
    }

    let id: string;
    try {
      id = decodeURIComponent(match[1]);
    } catch {
      skipped.push({ href, reason: "malformed escape in link" });
      return;
    }
    if (!DOCUMENT_ID_PATTERN.test(id)) {
      skipped.push({ href, reason: `invalid API identifier "${id}"` });
      return;
    }
    if (seen.has(id)) return;
    seen.add(id);

    const title =
      $(card).find(catalogLayout.cardTitleSelector).first().text().trim() || anchor.text().trim() || id;
    const description = $(card).find(catalogLayout.cardDescriptionSelector).first().text().trim();

    url.hash = "";
    links.push({ id, url: url.toString(), title, description });
  });

  return { links, skipped };
}

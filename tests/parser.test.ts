import { describe, expect, it } from "vitest";
import { parseIndexPage } from "../src/parser/index-page-parser.js";
import { parseDetailPage, parseEndpoint } from "../src/parser/detail-page-parser.js";
import { ParseError } from "../src/errors.js";

const CATALOG_URL = "https://catalog.test/city/catalog";
const SCRAPED_AT = new Date("2026-03-01T00:00:00.000Z");

describe("parseIndexPage", () => {
  const page = `
    <div class="api-card">
      <h3>避難所</h3><p class="description">指定避難所</p>
      <a href="/city/catalog/EvacuationShelter">詳細</a>
    </div>
    <div class="api-item"><a href="catalog/AED">AED</a></div>
    <div class="catalog-item"><span>no link</span></div>
    <div class="api-card"><a href="https://elsewhere.test/city/catalog/X">x</a></div>
    <div class="api-card"><a href="/city/catalog/EvacuationShelter#top">dup</a></div>
    <div class="api-card"><a href="/city/catalog/%E9%81%BF">bad id</a></div>
  `;

  it("resolves card links to detail pages", () => {
    const { links } = parseIndexPage(page, CATALOG_URL, CATALOG_URL);

    expect(links).toEqual([
      {
        id: "EvacuationShelter",
        url: "https://catalog.test/city/catalog/EvacuationShelter",
        title: "避難所",
        description: "指定避難所",
      },
      { id: "AED", url: "https://catalog.test/city/catalog/AED", title: "AED", description: "" },
    ]);
  });

  it("reports cards it cannot follow", () => {
    const { skipped } = parseIndexPage(page, CATALOG_URL, CATALOG_URL);

    expect(skipped).toEqual([
      { href: null, reason: "card has no link" },
      { href: "https://elsewhere.test/city/catalog/X", reason: "not a catalog detail link" },
      { href: "/city/catalog/%E9%81%BF", reason: 'invalid API identifier "避"' },
    ]);
  });
});

describe("parseEndpoint", () => {
  it("defaults the method to GET and collects query keys", () => {
    expect(parseEndpoint("/v2/entities?type=A&limit=10")).toEqual({
      method: "GET",
      path: "/v2/entities",
      parameters: ["type", "limit"],
    });
  });

  it("normalizes the method and de-duplicates parameters", () => {
    expect(parseEndpoint("post  https://api.test/v2/op?type=A&type=B")).toEqual({
      method: "POST",
      path: "https://api.test/v2/op",
      parameters: ["type"],
    });
  });

  it("rejects prose", () => {
    expect(parseEndpoint("see the docs")).toBeNull();
    expect(parseEndpoint("entities")).toBeNull();
  });
});

describe("parseDetailPage", () => {
  const link = {
    id: "EvacuationShelter",
    url: "https://catalog.test/city/catalog/EvacuationShelter",
    title: "避難所 (card)",
    description: "card description",
  };

  it("extracts every section of a complete page", () => {
    const doc = parseDetailPage(
      `<html><body>
        <h1>避難所情報</h1>
        <p>市内の指定避難所の位置と収容人数</p>
        <div data-service-path="/Shelter"></div>
        <table>
          <tr><th>属性名</th><th>名称</th><th>データ型</th><th>説明</th></tr>
          <tr><td>Name</td><td>施設名</td><td>Text</td><td>避難所の名称</td></tr>
          <tr><td>location</td><td>位置</td><td>geo:json</td><td>緯度経度</td></tr>
          <tr><td>Name</td><td>dup</td><td>Text</td><td>dup</td></tr>
        </table>
        <code class="endpoint">GET /v2/entities?type=EvacuationShelter&amp;limit=10</code>
        <pre class="endpoint">/v2/entities/{id}</pre>
        <h3>レスポンス例</h3>
        <pre class="example">[{"id":"urn:ngsi-ld:EvacuationShelter:001","type":"EvacuationShelter"}]</pre>
      </body></html>`,
      link,
      SCRAPED_AT,
    );

    expect(doc).toEqual({
      id: "EvacuationShelter",
      name: "避難所情報",
      description: "市内の指定避難所の位置と収容人数",
      attributes: [
        { name: "Name", label: "施設名", type: "Text", description: "避難所の名称" },
        { name: "location", label: "位置", type: "geo:json", description: "緯度経度" },
      ],
      endpoints: [
        { method: "GET", path: "/v2/entities", parameters: ["type", "limit"] },
        { method: "GET", path: "/v2/entities/{id}", parameters: [] },
      ],
      examples: [
        {
          label: "レスポンス例",
          body: [{ id: "urn:ngsi-ld:EvacuationShelter:001", type: "EvacuationShelter" }],
        },
      ],
      servicePath: "/Shelter",
      tags: ["disaster", "infrastructure"],
      sourceUrl: "https://catalog.test/city/catalog/EvacuationShelter",
      scrapedAt: "2026-03-01T00:00:00.000Z",
      completeness: { status: "complete" },
    });
  });

  it("marks missing sections and falls back to the default service path", () => {
    const doc = parseDetailPage(
      "<h1>気象観測</h1><p>雨量の観測値</p>",
      { ...link, id: "WeatherObserved" },
      SCRAPED_AT,
    );

    expect(doc.completeness).toEqual({ status: "partial", missing: ["attributes", "endpoints"] });
    expect(doc.servicePath).toBe("/WeatherObserved");
    expect(doc.description).toBe("雨量の観測値");
    expect(doc.tags).toEqual(["environment"]);
  });

  it("uses the card title and description when the page has neither", () => {
    const doc = parseDetailPage(
      "<table><tr><th>attribute</th><th>type</th></tr><tr><td>Name</td><td>Text</td></tr></table>",
      link,
      SCRAPED_AT,
    );

    expect(doc.name).toBe("避難所 (card)");
    expect(doc.description).toBe("card description");
    expect(doc.attributes).toEqual([{ name: "Name", type: "Text", description: "" }]);
    expect(doc.completeness).toEqual({ status: "partial", missing: ["endpoints"] });
  });

  it("reads the service path from page text", () => {
    const doc = parseDetailPage("<h1>X</h1><p>Fiware-ServicePath: /custom/path</p>", link, SCRAPED_AT);
    expect(doc.servicePath).toBe("/custom/path");
  });

  it("keeps non-JSON examples as text", () => {
    const doc = parseDetailPage(
      '<h1>X</h1><pre class="example" data-label="curl">curl -H apikey</pre>',
      link,
      SCRAPED_AT,
    );
    expect(doc.examples).toEqual([{ label: "curl", body: "curl -H apikey" }]);
  });

  it("raises ParseError for a page with no API content", () => {
    expect(() => parseDetailPage("<div><p>maintenance</p></div>", link, SCRAPED_AT)).toThrow(ParseError);
  });
});

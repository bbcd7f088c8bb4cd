/**
 * Layout of the catalog website. Selectors and header patterns are matched
 * against the rendered HTML of the index and detail pages.
 */
export const catalogLayout = {
  catalogPath: "/catalog",
  cardSelector: ".api-card, .api-item, .catalog-item",
  cardTitleSelector: "h2, h3, h4",
  cardDescriptionSelector: ".description, .desc, .summary",
  descriptionSelector: ".api-description, .description",
  endpointSelector: "code.endpoint, pre.endpoint, .endpoint code",
  exampleSelector: "pre.example, .example pre, code.language-json",
  servicePathAttribute: "data-service-path",
} as const;

/** Attribute table header patterns, checked in the order label, name, type, description. */
export const attributeHeaders = {
  label: /名称|日本語名|label|display/i,
  name: /属性名|項目名|属性|attribute|^name$|パラメータ|parameter|field/i,
  type: /データ型|^型$|type/i,
  description: /説明|内容|備考|description/i,
} as const;

/** Reference point used by generated geo-query examples (Yaizu Station). */
export const sampleLocation = {
  latitude: 34.8675,
  longitude: 138.3236,
  maxDistance: 1000,
} as const;

export const USER_AGENT = "city-api-catalog-mcp/0.1 (+smartcity-service)";

import { afterEach, describe, expect, it, vi } from "vitest";
import { EntityApiClient } from "../src/ngsi/entity-client.js";
import { TEST_ENTITY_URL, json, stubFetch } from "./helpers.js";

const RATE_HEADERS = {
  "x-ratelimit-remaining-minute": "59",
  "x-ratelimit-limit-minute": "60",
  "ratelimit-reset": "30",
};

function createClient(apiKey: string | undefined = "test-api-key") {
  return new EntityApiClient({
    baseUrl: TEST_ENTITY_URL,
    apiKey,
    fiwareService: "test_city",
    traceId: () => "trace-1",
  });
}

const shelter = {
  id: "urn:ngsi-ld:EvacuationShelter:001",
  type: "EvacuationShelter",
  Name: { type: "Text", value: "焼津小学校" },
  EquipmentAddress: { type: "StructuredValue", value: { FullAddress: "静岡県焼津市本町1-1" } },
  location: { type: "geo:json", value: { type: "Point", coordinates: [138.3236, 34.8675] } },
};

describe("EntityApiClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("queries the entity API and summarizes the records", async () => {
    const { calls } = stubFetch({
      [TEST_ENTITY_URL]: () => json([shelter, { id: "urn:2", type: "EvacuationShelter" }], 200, RATE_HEADERS),
    });

    const result = await createClient().execute("EvacuationShelter", {
      near: { latitude: 34.8675, longitude: 138.3236, maxDistance: 500 },
      limit: 2,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.status).toBe(200);
    expect(result.query).toEqual({
      type: "EvacuationShelter",
      georel: "near;maxDistance:500",
      geometry: "point",
      coords: "34.8675,138.3236",
      limit: "2",
    });
    expect(result.summary).toEqual({
      count: 2,
      items: [
        {
          id: "urn:ngsi-ld:EvacuationShelter:001",
          type: "EvacuationShelter",
          name: "焼津小学校",
          address: "静岡県焼津市本町1-1",
          location: { latitude: 34.8675, longitude: 138.3236 },
        },
        { id: "urn:2", type: "EvacuationShelter" },
      ],
    });
    expect(result.records[0]).toEqual(shelter);
    expect(result.rateLimit).toEqual({ remaining: "59", limit: "60", reset: "30" });
    expect(result.rateLimited).toBe(false);
    expect(result.traceId).toBe("trace-1");

    const sent = new URL(calls[0].url);
    expect(sent.searchParams.get("georel")).toBe("near;maxDistance:500");
    expect(sent.searchParams.get("type")).toBe("EvacuationShelter");
    expect(calls[0].headers.get("apikey")).toBe("test-api-key");
    expect(calls[0].headers.get("fiware-service")).toBe("test_city");
    expect(calls[0].headers.get("fiware-servicepath")).toBe("/EvacuationShelter");
    expect(calls[0].headers.get("x-request-trace-id")).toBe("trace-1");
  });

  it("sends only the type when no parameters are given", async () => {
    const { calls } = stubFetch({ [TEST_ENTITY_URL]: () => json([]) });

    const result = await createClient().execute("AED", {});

    expect(result.query).toEqual({ type: "AED" });
    expect([...new URL(calls[0].url).searchParams.keys()]).toEqual(["type"]);
  });

  it("uses the service path it is given", async () => {
    const { calls } = stubFetch({ [TEST_ENTITY_URL]: () => json([]) });

    await createClient().execute("AED", {}, { servicePath: "/health/aed" });

    expect(calls[0].headers.get("fiware-servicepath")).toBe("/health/aed");
  });

  it("flags an exhausted rate limit on a successful response", async () => {
    stubFetch({
      [TEST_ENTITY_URL]: () => json([], 200, { ...RATE_HEADERS, "x-ratelimit-remaining-minute": "0" }),
    });

    const result = await createClient().execute("AED", {});

    expect(result.ok).toBe(true);
    expect(result.rateLimited).toBe(true);
    expect(result.rateLimit.remaining).toBe("0");
  });

  it("reports 429 as a rate-limit failure", async () => {
    stubFetch({
      [TEST_ENTITY_URL]: () =>
        json({ message: "API rate limit exceeded" }, 429, { ...RATE_HEADERS, "x-ratelimit-remaining-minute": "0" }),
    });

    const result = await createClient().execute("AED", {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("RateLimitError");
    expect(result.error.message).toBe("Entity API rate limit reached (HTTP 429). Retry after 30 seconds.");
    expect(result.rateLimited).toBe(true);
    expect(result.status).toBe(429);
  });

  it.each([
    [400, "ValidationError"],
    [401, "AuthenticationError"],
    [403, "AuthenticationError"],
    [404, "NotFoundError"],
    [500, "FetchError"],
  ])("maps HTTP %i to %s", async (status, kind) => {
    stubFetch({ [TEST_ENTITY_URL]: () => json({ error: "upstream says no" }, status) });

    const result = await createClient().execute("AED", {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe(kind);
    expect(result.error.detail).toBe('{"error":"upstream says no"}');
    expect(result.status).toBe(status);
  });

  it("names the entity type and service path on 404", async () => {
    stubFetch({ [TEST_ENTITY_URL]: () => new Response("", { status: 404 }) });

    const result = await createClient().execute("Unknown", {});

    if (result.ok) throw new Error("expected a failure");
    expect(result.error.message).toBe(
      'No entities of type "Unknown" under service path "/Unknown" (HTTP 404). Check the entity type with list_saved_apis',
    );
  });

  it("reports a body that is not JSON", async () => {
    stubFetch({ [TEST_ENTITY_URL]: () => new Response("<html>oops</html>", { status: 200 }) });

    const result = await createClient().execute("AED", {});

    if (result.ok) throw new Error("expected a failure");
    expect(result.error.kind).toBe("ParseError");
  });

  it("wraps a single entity object as one record", async () => {
    stubFetch({ [TEST_ENTITY_URL]: () => json(shelter) });

    const result = await createClient().execute("EvacuationShelter", { id: shelter.id });

    if (!result.ok) throw new Error("expected success");
    expect(result.records).toEqual([shelter]);
    expect(result.summary.count).toBe(1);
  });

  it.each([
    ["a limit above 1000", { limit: 5000 }],
    ["near together with spatial", {
      near: { latitude: 34.8, longitude: 138.3, maxDistance: 100 },
      spatial: { georel: "coveredBy", geometry: "polygon", coords: "34.8,138.3;34.9,138.3;34.9,138.4;34.8,138.3" },
    }],
    ["id together with idPattern", { id: "urn:1", idPattern: "^urn" }],
    ["an unknown option", { format: "csv" }],
  ])("rejects %s before any request", async (_label, parameters) => {
    const { fake } = stubFetch({ [TEST_ENTITY_URL]: () => json([]) });

    const result = await createClient().execute("AED", parameters);

    if (result.ok) throw new Error("expected a failure");
    expect(result.error.kind).toBe("ValidationError");
    expect(result.status).toBeNull();
    expect(fake).not.toHaveBeenCalled();
  });

  it("rejects an entity type that is not an identifier", async () => {
    const { fake } = stubFetch({ [TEST_ENTITY_URL]: () => json([]) });

    const result = await createClient().execute("../admin", {});

    if (result.ok) throw new Error("expected a failure");
    expect(result.error.kind).toBe("ValidationError");
    expect(fake).not.toHaveBeenCalled();
  });

  it("refuses to query without an API key", async () => {
    const { fake } = stubFetch({ [TEST_ENTITY_URL]: () => json([]) });

    const result = await createClient(undefined).execute("AED", { limit: 1 });

    if (result.ok) throw new Error("expected a failure");
    expect(result.error.kind).toBe("AuthenticationError");
    expect(result.query).toEqual({ type: "AED", limit: "1" });
    expect(fake).not.toHaveBeenCalled();
  });

  it("returns a fetch failure when the network is down", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    const result = await createClient().execute("AED", {});

    if (result.ok) throw new Error("expected a failure");
    expect(result.error.kind).toBe("FetchError");
    expect(result.error.message).toBe(`Request to ${TEST_ENTITY_URL}?type=AED failed: fetch failed`);
    expect(result.status).toBeNull();
    expect(result.traceId).toBe("trace-1");
  });
});

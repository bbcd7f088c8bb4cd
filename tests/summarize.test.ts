import { describe, expect, it } from "vitest";
import { digestEntity, summarizeEntities } from "../src/ngsi/summarize.js";

describe("digestEntity", () => {
  it("reads keyValues-style records", () => {
    expect(
      digestEntity({
        id: "urn:1",
        type: "Facility",
        name: "市役所",
        address: { addressRegion: "静岡県", addressLocality: "焼津市", streetAddress: "本町2-16-32" },
        location: { type: "Point", coordinates: [138.32, 34.86] },
      }),
    ).toEqual({
      id: "urn:1",
      type: "Facility",
      name: "市役所",
      address: "静岡県焼津市本町2-16-32",
      location: { latitude: 34.86, longitude: 138.32 },
    });
  });

  it("parses a latitude,longitude installation position", () => {
    const digest = digestEntity({
      id: "urn:2",
      type: "AED",
      InstallationPosition: { type: "Text", value: "34.86, 138.32" },
    });
    expect(digest.location).toEqual({ latitude: 34.86, longitude: 138.32 });
  });

  it("keeps a descriptive position as text", () => {
    const digest = digestEntity({ id: "urn:3", type: "AED", InstallationPosition: { value: "庁舎1階入口" } });
    expect(digest.location).toBe("庁舎1階入口");
  });

  it("tolerates records without the usual attributes", () => {
    expect(digestEntity({ Name: { value: 42 } })).toEqual({ id: null, type: null, name: "42" });
  });
});

describe("summarizeEntities", () => {
  it("counts records and keeps their order", () => {
    const summary = summarizeEntities([{ id: "b", type: "T" }, { id: "a", type: "T" }]);
    expect(summary).toEqual({ count: 2, items: [{ id: "b", type: "T" }, { id: "a", type: "T" }] });
  });
});

import type { EntityDigest, EntitySummary, GeoPoint, NgsiEntity } from "./types.js";

const NAME_ATTRIBUTES = ["Name", "name", "名称", "EquipmentName", "FacilityName", "title"];
const ADDRESS_ATTRIBUTES = ["EquipmentAddress", "address", "Address", "FullAddress"];
const LOCATION_ATTRIBUTES = ["location", "InstallationPosition", "position", "Location"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Normalized attributes wrap the payload in `{ type, value }`; keyValues responses do not. */
function unwrap(attribute: unknown): unknown {
  return isRecord(attribute) && "value" in attribute ? attribute.value : attribute;
}

function asText(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed || undefined;
  }
  if (typeof value === "number") return String(value);
  return undefined;
}

function pick<T>(entity: NgsiEntity, names: string[], read: (value: unknown) => T | undefined): T | undefined {
  for (const name of names) {
    if (!(name in entity)) continue;
    const found = read(unwrap(entity[name]));
    if (found !== undefined) return found;
  }
  return undefined;
}

function readAddress(value: unknown): string | undefined {
  const text = asText(value);
  if (text) return text;
  if (!isRecord(value)) return undefined;

  const full = asText(unwrap(value.FullAddress)) ?? asText(unwrap(value.fullAddress));
  if (full) return full;

  const parts = ["addressRegion", "addressLocality", "streetAddress"]
    .map((key) => asText(value[key]))
    .filter((part): part is string => part !== undefined);
  return parts.length > 0 ? parts.join("") : undefined;
}

function toPoint(latitude: unknown, longitude: unknown): GeoPoint | undefined {
  const lat = typeof latitude === "string" ? Number(latitude) : latitude;
  const lon = typeof longitude === "string" ? Number(longitude) : longitude;
  if (typeof lat !== "number" || typeof lon !== "number" || Number.isNaN(lat) || Number.isNaN(lon)) {
    return undefined;
  }
  return { latitude: lat, longitude: lon };
}

function readLocation(value: unknown): GeoPoint | string | undefined {
  if (typeof value === "string") {
    const [lat, lon, ...rest] = value.split(",").map((part) => part.trim());
    if (lat !== undefined && lon !== undefined && rest.length === 0) {
      return toPoint(lat, lon) ?? value;
    }
    return asText(value);
  }
  if (!isRecord(value)) return undefined;

  // GeoJSON points are [longitude, latitude]
  if (value.type === "Point" && Array.isArray(value.coordinates)) {
    return toPoint(value.coordinates[1], value.coordinates[0]);
  }
  return toPoint(value.latitude ?? value.lat, value.longitude ?? value.lon ?? value.lng);
}

export function digestEntity(entity: NgsiEntity): EntityDigest {
  const digest: EntityDigest = {
    id: typeof entity.id === "string" ? entity.id : null,
    type: typeof entity.type === "string" ? entity.type : null,
  };

  const name = pick(entity, NAME_ATTRIBUTES, asText);
  if (name) digest.name = name;
  const address = pick(entity, ADDRESS_ATTRIBUTES, readAddress);
  if (address) digest.address = address;
  const location = pick(entity, LOCATION_ATTRIBUTES, readLocation);
  if (location) digest.location = location;

  return digest;
}

/** One digest per record, in response order. Records are never mutated. */
export function summarizeEntities(records: NgsiEntity[]): EntitySummary {
  return { count: records.length, items: records.map(digestEntity) };
}

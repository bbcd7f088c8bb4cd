import { normalizeText } from "../utils/text.js";
import type { Attribute, Groupings } from "../store/schema.js";

/**
 * Keyword -> tag table, matched as substrings of the normalized document text.
 * English keywords must not occur inside unrelated words ("event" in
 * "prevention", "road" in "broadcast").
 */
export const TAG_KEYWORDS: Readonly<Record<string, readonly string[]>> = {
  disaster: [
    "防災", "災害", "避難", "警報", "注意報", "緊急", "地震", "津波", "台風", "洪水", "土砂", "ハザード",
    "disaster", "emergency", "evacuation", "shelter", "alert", "flood", "tsunami",
  ],
  medical: ["救護", "医療", "病院", "aed", "hospital", "firstaid", "first aid"],
  environment: ["気象", "環境", "雨量", "水位", "weather", "precipitation", "gauge", "sensor", "forecast"],
  infrastructure: ["施設", "設備", "給水", "facility", "infrastructure", "building", "warehouse", "tank"],
  transportation: ["交通", "道路", "駐車", "traffic", "parking", "restricted"],
  tourism: ["観光", "イベント", "産業", "直売", "tourism", "sightseeing"],
};

export interface Classifiable {
  id: string;
  name: string;
  description: string;
  attributes: Attribute[];
}

export function classify(doc: Classifiable): string[] {
  const haystack = normalizeText(
    [
      doc.id,
      doc.name,
      doc.description,
      ...doc.attributes.flatMap((a) => [a.name, a.label ?? "", a.description]),
    ].join("\n"),
  );

  return Object.entries(TAG_KEYWORDS)
    .filter(([, keywords]) => keywords.some((kw) => haystack.includes(normalizeText(kw))))
    .map(([tag]) => tag)
    .sort();
}

export function groupByTag(docs: Array<{ id: string; tags: string[] }>): Groupings {
  const groups = new Map<string, Set<string>>();
  for (const doc of docs) {
    for (const tag of doc.tags) {
      const members = groups.get(tag) ?? new Set<string>();
      members.add(doc.id);
      groups.set(tag, members);
    }
  }

  const groupings: Groupings = {};
  for (const tag of [...groups.keys()].sort()) {
    groupings[tag] = [...(groups.get(tag) ?? [])].sort();
  }
  return groupings;
}

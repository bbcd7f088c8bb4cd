import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from "fs/promises";
import { join } from "path";
import { randomUUID } from "crypto";
import { createChildLogger } from "../utils/logger.js";
import { normalizeText } from "../utils/text.js";
import { NotFoundError, ParseError, ValidationError, errorMessage, isMissingFile } from "../errors.js";
import {
  DOCUMENT_ID_PATTERN,
  apiDocumentSchema,
  groupFileSchema,
  indexFileSchema,
  type ApiDocument,
  type CatalogIndex,
  type Groupings,
} from "./schema.js";

const log = createChildLogger("document-store");

const INDEX_FILE = "_index.json";
const GROUPS_DIR = "groups";

export interface SaveResult {
  documents: number;
  groups: number;
  files: string[];
}

export interface StoreStats {
  documents: number;
  groups: string[];
  lastScrapedAt: string | null;
}

export function buildCatalogIndex(documents: ApiDocument[]): CatalogIndex {
  const index: CatalogIndex = {};
  for (const doc of [...documents].sort(byId)) {
    index[doc.id] = { name: doc.name, tags: [...doc.tags] };
  }
  return index;
}

function byId(a: { id: string }, b: { id: string }): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function assertValidName(kind: string, name: string): void {
  if (!DOCUMENT_ID_PATTERN.test(name)) {
    throw new ValidationError(`Invalid ${kind} "${name}"`, [
      "use letters, digits, '_', '.' or '-' and start with a letter or digit",
    ]);
  }
}

/**
 * Directory of JSON files: one per document (`<id>.json`), one per tag under
 * `groups/`, plus `_index.json` regenerated after every save. A save replaces
 * the whole set of groups. Each file is
 * committed with write-then-rename, so a reader sees the old or the new
 * contents and never a torn write.
 */
export class DocumentStore {
  constructor(public readonly dir: string) {}

  async save(documents: ApiDocument[], groupings: Groupings): Promise<SaveResult> {
    const seen = new Set<string>();
    for (const doc of documents) {
      const parsed = apiDocumentSchema.safeParse(doc);
      if (!parsed.success) {
        throw new ValidationError(
          `Document "${doc.id}" is not storable`,
          parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
        );
      }
      if (seen.has(doc.id)) {
        throw new ValidationError(`Duplicate document id "${doc.id}"`);
      }
      seen.add(doc.id);
    }
    for (const tag of Object.keys(groupings)) {
      assertValidName("tag", tag);
    }

    await mkdir(join(this.dir, GROUPS_DIR), { recursive: true });

    const files: string[] = [];
    for (const doc of documents) {
      const path = this.documentPath(doc.id);
      await this.writeAtomic(path, doc);
      files.push(path);
    }

    for (const [tag, ids] of Object.entries(groupings)) {
      const path = this.groupPath(tag);
      await this.writeAtomic(path, { tag, ids: [...new Set(ids)].sort() });
      files.push(path);
    }

    for (const tag of await this.listGroups()) {
      if (!Object.hasOwn(groupings, tag)) {
        await rm(this.groupPath(tag), { force: true });
        log.info({ tag }, "Removed stale group");
      }
    }

    const index = buildCatalogIndex(await this.listDocuments());
    const indexPath = join(this.dir, INDEX_FILE);
    await this.writeAtomic(indexPath, { generatedAt: new Date().toISOString(), entries: index });
    files.push(indexPath);

    log.info(
      { dir: this.dir, documents: documents.length, groups: Object.keys(groupings).length },
      "Saved documents",
    );

    return { documents: documents.length, groups: Object.keys(groupings).length, files };
  }

  async load(id: string): Promise<ApiDocument> {
    assertValidName("document id", id);

    let raw: string;
    try {
      raw = await readFile(this.documentPath(id), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        throw new NotFoundError(
          `No cached API document "${id}". Run scrape_api_docs to refresh the catalog, or check the spelling.`,
        );
      }
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new ParseError(`Document "${id}" is not valid JSON: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = apiDocumentSchema.safeParse(data);
    if (!parsed.success) {
      throw new ParseError(`Document "${id}" does not match the document schema`, { cause: parsed.error });
    }
    if (parsed.data.id !== id) {
      throw new ParseError(`Document file "${id}.json" holds id "${parsed.data.id}"`);
    }
    return parsed.data;
  }

  async listIds(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    return names
      .filter((name) => name.endsWith(".json") && DOCUMENT_ID_PATTERN.test(name))
      .map((name) => name.slice(0, -".json".length))
      .sort();
  }

  /** Every readable document, id ascending. Unreadable files are skipped. */
  async listDocuments(): Promise<ApiDocument[]> {
    const documents: ApiDocument[] = [];
    for (const id of await this.listIds()) {
      try {
        documents.push(await this.load(id));
      } catch (err) {
        log.warn({ id, err }, "Skipping unreadable document");
      }
    }
    return documents;
  }

  /**
   * Case-insensitive substring search over name, description and attribute
   * names. Name matches rank first; ties are broken by id.
   */
  async search(keyword: string): Promise<ApiDocument[]> {
    const needle = normalizeText(keyword.trim());
    if (!needle) {
      throw new ValidationError("Search keyword must not be empty");
    }

    const ranked: Array<{ doc: ApiDocument; rank: number }> = [];
    for (const doc of await this.listDocuments()) {
      if (normalizeText(doc.name).includes(needle)) {
        ranked.push({ doc, rank: 0 });
        continue;
      }
      const other = [
        doc.description,
        ...doc.attributes.flatMap((a) => (a.label ? [a.name, a.label] : [a.name])),
      ];
      if (other.some((text) => normalizeText(text).includes(needle))) {
        ranked.push({ doc, rank: 1 });
      }
    }

    return ranked.sort((a, b) => a.rank - b.rank || byId(a.doc, b.doc)).map((r) => r.doc);
  }

  /**
   * The cached `_index.json` when it still describes the files on disk: same
   * ids, and no document written after it. Otherwise rebuilt from documents.
   */
  async listSummary(): Promise<CatalogIndex> {
    const indexPath = join(this.dir, INDEX_FILE);
    try {
      const raw = await readFile(indexPath, "utf-8");
      const parsed = indexFileSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        log.warn({ dir: this.dir }, "Index file is malformed, rebuilding from documents");
      } else if (await this.indexIsCurrent(indexPath, Object.keys(parsed.data.entries))) {
        const index: CatalogIndex = {};
        for (const id of Object.keys(parsed.data.entries).sort()) {
          index[id] = parsed.data.entries[id];
        }
        return index;
      } else {
        log.info({ dir: this.dir }, "Index file is stale, rebuilding from documents");
      }
    } catch (err) {
      if (!isMissingFile(err)) {
        log.warn({ dir: this.dir, err }, "Index file is unreadable, rebuilding from documents");
      }
    }
    return buildCatalogIndex(await this.listDocuments());
  }

  async listGroups(): Promise<string[]> {
    try {
      const names = await readdir(join(this.dir, GROUPS_DIR));
      return names
        .filter((name) => name.endsWith(".json") && DOCUMENT_ID_PATTERN.test(name))
        .map((name) => name.slice(0, -".json".length))
        .sort();
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
  }

  /** Documents tagged `tag`; an unknown tag yields an empty list. */
  async loadGroup(tag: string): Promise<ApiDocument[]> {
    assertValidName("tag", tag);

    let ids: string[];
    try {
      const raw = await readFile(this.groupPath(tag), "utf-8");
      ids = groupFileSchema.parse(JSON.parse(raw)).ids;
    } catch (err) {
      if (isMissingFile(err)) return [];
      log.warn({ tag, err }, "Skipping unreadable group file");
      return [];
    }

    const documents: ApiDocument[] = [];
    for (const id of ids) {
      try {
        documents.push(await this.load(id));
      } catch (err) {
        log.warn({ tag, id, err }, "Skipping group member");
      }
    }
    return documents;
  }

  async stats(): Promise<StoreStats> {
    const documents = await this.listDocuments();
    const lastScrapedAt = documents.reduce<string | null>(
      (latest, doc) => (latest === null || doc.scrapedAt > latest ? doc.scrapedAt : latest),
      null,
    );
    return { documents: documents.length, groups: await this.listGroups(), lastScrapedAt };
  }

  private async indexIsCurrent(indexPath: string, indexedIds: string[]): Promise<boolean> {
    const ids = await this.listIds();
    if (ids.length !== indexedIds.length || !indexedIds.every((id) => ids.includes(id))) {
      return false;
    }
    const indexedAt = (await stat(indexPath)).mtimeMs;
    for (const id of ids) {
      if ((await stat(this.documentPath(id))).mtimeMs > indexedAt) return false;
    }
    return true;
  }

  private documentPath(id: string): string {
    return join(this.dir, `${id}.json`);
  }

  private groupPath(tag: string): string {
    return join(this.dir, GROUPS_DIR, `${tag}.json`);
  }

  private async writeAtomic(path: string, data: unknown): Promise<void> {
    const tmp = `${path}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmp, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
      await rename(tmp, path);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
  }
}

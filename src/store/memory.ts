import { isDeepStrictEqual } from "util";
import { DocumentId } from "./document-id.js";
import type { DocumentFields, DocumentFilter, DocumentStore, StoredDocument } from "./types.js";

interface MemoryRecord {
  id: DocumentId;
  data: DocumentFields;
}

function matches(data: DocumentFields, filter: DocumentFilter): boolean {
  return Object.entries(filter).every(([key, expected]) => isDeepStrictEqual(data[key], expected));
}

function snapshot(record: MemoryRecord): StoredDocument {
  return { id: record.id, data: structuredClone(record.data) };
}

/**
 * In-process document store. Collections are insertion-ordered maps keyed by
 * the id's hex string; records are cloned on the way in and out.
 */
export class MemoryDocumentStore implements DocumentStore {
  private readonly collections = new Map<string, Map<string, MemoryRecord>>();

  constructor(readonly name: string = "memory") {}

  private readable(name: string): Map<string, MemoryRecord> {
    return this.collections.get(name) ?? new Map();
  }

  private writable(name: string): Map<string, MemoryRecord> {
    let records = this.collections.get(name);
    if (!records) {
      records = new Map();
      this.collections.set(name, records);
    }
    return records;
  }

  async insert(collection: string, data: DocumentFields): Promise<DocumentId> {
    const id = DocumentId.generate();
    this.writable(collection).set(id.toString(), { id, data: structuredClone(data) });
    return id;
  }

  async find(collection: string, filter: DocumentFilter, limit: number): Promise<StoredDocument[]> {
    const results: StoredDocument[] = [];
    for (const record of this.readable(collection).values()) {
      if (results.length >= limit) break;
      if (matches(record.data, filter)) results.push(snapshot(record));
    }
    return results;
  }

  async findById(collection: string, id: DocumentId): Promise<StoredDocument | null> {
    const record = this.readable(collection).get(id.toString());
    return record ? snapshot(record) : null;
  }

  async updateById(collection: string, id: DocumentId, fields: DocumentFields): Promise<StoredDocument | null> {
    const record = this.readable(collection).get(id.toString());
    if (!record) return null;
    record.data = { ...record.data, ...structuredClone(fields) };
    return snapshot(record);
  }

  async listCollections(): Promise<string[]> {
    return Array.from(this.collections.keys());
  }

  async close(): Promise<void> {
    this.collections.clear();
  }
}

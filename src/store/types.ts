import type { DocumentId } from "./document-id.js";

export type DocumentFields = Record<string, unknown>;

export interface StoredDocument {
  id: DocumentId;
  data: DocumentFields;
}

/** Record as returned over the API: stored fields plus the string id. */
export type PublicDocument = DocumentFields & { id: string };

/** Exact-match conjunction over top-level fields. */
export type DocumentFilter = Record<string, unknown>;

export interface DocumentStore {
  /** Database name, reported by the diagnostics endpoint. */
  readonly name: string;
  insert(collection: string, data: DocumentFields): Promise<DocumentId>;
  find(collection: string, filter: DocumentFilter, limit: number): Promise<StoredDocument[]>;
  findById(collection: string, id: DocumentId): Promise<StoredDocument | null>;
  /** Set the given fields on one record and return it as it is after the write. */
  updateById(collection: string, id: DocumentId, fields: DocumentFields): Promise<StoredDocument | null>;
  listCollections(): Promise<string[]>;
  close(): Promise<void>;
}

import type { Config } from "../config.js";
import { ServiceUnavailableError } from "../errors.js";
import { log } from "../logger.js";
import { MemoryDocumentStore } from "./memory.js";
import { MongoDocumentStore } from "./mongo.js";
import type { DocumentStore, PublicDocument, StoredDocument } from "./types.js";

export { DocumentId } from "./document-id.js";
export { MemoryDocumentStore } from "./memory.js";
export { MongoDocumentStore } from "./mongo.js";
export type {
  DocumentFields,
  DocumentFilter,
  DocumentStore,
  PublicDocument,
  StoredDocument,
} from "./types.js";

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 200;

/** Missing or non-positive limits fall back to the default; large ones are capped. */
export function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit) || limit <= 0) return DEFAULT_LIST_LIMIT;
  return Math.min(Math.floor(limit), MAX_LIST_LIMIT);
}

export function requireStore(store: DocumentStore | null): DocumentStore {
  if (!store) {
    throw new ServiceUnavailableError();
  }
  return store;
}

export function toPublic(doc: StoredDocument): PublicDocument {
  return { ...doc.data, id: doc.id.toString() };
}

function isMemoryUrl(url: string): boolean {
  return url.startsWith("memory:");
}

/**
 * Open the process-wide store. Returns null when no DATABASE_URL is set or the
 * connection fails; the server keeps running and store-backed routes answer 503.
 */
export async function openStore(config: Config): Promise<DocumentStore | null> {
  const url = config.databaseUrl;
  if (!url) {
    log.warn("store", "DATABASE_URL not set — running without a database");
    return null;
  }

  if (isMemoryUrl(url)) {
    log.info("store", "using in-memory document store");
    return new MemoryDocumentStore(config.databaseName ?? "memory");
  }

  try {
    const store = await MongoDocumentStore.connect(url, config.databaseName);
    log.info("store", `connected to database ${store.name}`);
    return store;
  } catch (err) {
    log.error("store", "database connection failed:", err);
    return null;
  }
}

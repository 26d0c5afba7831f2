import mongoose, { type Connection } from "mongoose";
import { log } from "../logger.js";
import { DocumentId } from "./document-id.js";
import type { DocumentFields, DocumentFilter, DocumentStore, StoredDocument } from "./types.js";

const SERVER_SELECTION_TIMEOUT_MS = 5000;

/** Split a raw Mongo document into its id and fields. Any `_id` type is accepted. */
export function toStored(doc: Record<string, unknown>): StoredDocument {
  const { _id, ...data } = doc;
  return { id: DocumentId.fromStored(_id), data };
}

/**
 * MongoDB-backed store. Uses a dedicated mongoose connection but talks to the
 * native collections directly; records are schemaless here and validated at
 * the HTTP boundary instead.
 */
export class MongoDocumentStore implements DocumentStore {
  private constructor(private readonly connection: Connection) {}

  static async connect(url: string, dbName?: string): Promise<MongoDocumentStore> {
    const connection = mongoose.createConnection(url, {
      ...(dbName ? { dbName } : {}),
      serverSelectionTimeoutMS: SERVER_SELECTION_TIMEOUT_MS,
    });
    try {
      await connection.asPromise();
    } catch (err) {
      await connection.close().catch((closeErr: unknown) => {
        log.debug("store", "closing the failed connection also failed:", closeErr);
      });
      throw err;
    }
    return new MongoDocumentStore(connection);
  }

  get name(): string {
    return this.connection.name;
  }

  private collection(name: string) {
    return this.connection.collection<{ _id?: DocumentId["key"]; [field: string]: unknown }>(name);
  }

  async insert(collection: string, data: DocumentFields): Promise<DocumentId> {
    const result = await this.collection(collection).insertOne({ ...data });
    return DocumentId.fromStored(result.insertedId);
  }

  async find(collection: string, filter: DocumentFilter, limit: number): Promise<StoredDocument[]> {
    const docs = await this.collection(collection).find(filter).limit(limit).toArray();
    return docs.map(toStored);
  }

  async findById(collection: string, id: DocumentId): Promise<StoredDocument | null> {
    const doc = await this.collection(collection).findOne({ _id: id.key });
    return doc ? toStored(doc) : null;
  }

  async updateById(collection: string, id: DocumentId, fields: DocumentFields): Promise<StoredDocument | null> {
    const doc = await this.collection(collection).findOneAndUpdate(
      { _id: id.key },
      { $set: fields },
      { returnDocument: "after" },
    );
    return doc ? toStored(doc) : null;
  }

  async listCollections(): Promise<string[]> {
    const db = this.connection.db;
    if (!db) {
      throw new Error("connection has no database handle");
    }
    const collections = await db.listCollections({}, { nameOnly: true }).toArray();
    return collections.map((c) => c.name);
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}

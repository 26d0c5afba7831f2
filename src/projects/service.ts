import { NotFoundError } from "../errors.js";
import type { ProjectInput } from "../schemas.js";
import { DocumentId, clampLimit, toPublic, type DocumentStore, type PublicDocument } from "../store/index.js";

export const PROJECT_COLLECTION = "project";

export async function listProjects(store: DocumentStore, limit?: number): Promise<PublicDocument[]> {
  const docs = await store.find(PROJECT_COLLECTION, {}, clampLimit(limit));
  return docs.map(toPublic);
}

export async function createProject(store: DocumentStore, input: ProjectInput): Promise<{ id: string }> {
  const id = await store.insert(PROJECT_COLLECTION, { ...input });
  return { id: id.toString() };
}

export async function getProject(store: DocumentStore, rawId: string): Promise<PublicDocument> {
  const id = DocumentId.parse(rawId);
  const doc = await store.findById(PROJECT_COLLECTION, id);
  if (!doc) {
    throw new NotFoundError("Project not found");
  }
  return toPublic(doc);
}

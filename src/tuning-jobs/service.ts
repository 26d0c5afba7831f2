import { NotFoundError } from "../errors.js";
import { DEFAULT_TUNING_JOB_STATUS, type TuningJobInput } from "../schemas.js";
import {
  DocumentId,
  clampLimit,
  toPublic,
  type DocumentFilter,
  type DocumentStore,
  type PublicDocument,
} from "../store/index.js";

export const TUNING_JOB_COLLECTION = "tuningjob";

export interface ListTuningJobsOptions {
  limit?: number | undefined;
  /** Exact match on the stored project_id. Empty strings are ignored. */
  projectId?: string | undefined;
}

export interface CreatedTuningJob {
  id: DocumentId;
  status: string;
}

export async function listTuningJobs(
  store: DocumentStore,
  options: ListTuningJobsOptions = {},
): Promise<PublicDocument[]> {
  const filter: DocumentFilter = {};
  if (options.projectId) {
    filter.project_id = options.projectId;
  }
  const docs = await store.find(TUNING_JOB_COLLECTION, filter, clampLimit(options.limit));
  return docs.map(toPublic);
}

export async function createTuningJob(store: DocumentStore, input: TuningJobInput): Promise<CreatedTuningJob> {
  const status = input.status || DEFAULT_TUNING_JOB_STATUS;
  const id = await store.insert(TUNING_JOB_COLLECTION, { ...input, status });
  return { id, status };
}

export async function getTuningJob(store: DocumentStore, rawId: string): Promise<PublicDocument> {
  const id = DocumentId.parse(rawId);
  const doc = await store.findById(TUNING_JOB_COLLECTION, id);
  if (!doc) {
    throw new NotFoundError("Tuning job not found");
  }
  return toPublic(doc);
}

/**
 * Overwrite a job's status. Any string is accepted and no transition order is
 * enforced, so this races the lifecycle simulator on a last-write-wins basis.
 */
export async function updateTuningJobStatus(
  store: DocumentStore,
  rawId: string,
  status: string,
): Promise<PublicDocument> {
  const id = DocumentId.parse(rawId);
  const doc = await store.updateById(TUNING_JOB_COLLECTION, id, { status });
  if (!doc) {
    throw new NotFoundError("Tuning job not found");
  }
  return toPublic(doc);
}

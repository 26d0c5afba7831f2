import { z } from "zod/v4";
import { ValidationError } from "./errors.js";

export const TUNING_JOB_STATUSES = ["queued", "running", "completed", "failed"] as const;
export type TuningJobStatus = (typeof TUNING_JOB_STATUSES)[number];

export const DEFAULT_TUNING_JOB_STATUS: TuningJobStatus = "queued";

export const ProjectSchema = z.object({
  name: z.string().describe("Project name"),
  description: z.string().nullable().default(null).describe("Short description"),
  language: z.string().default("javascript").describe("Primary language"),
  framework: z.string().nullable().default(null).describe("Primary framework"),
  tags: z.array(z.string()).default(() => []).describe("Project tags"),
  settings: z.record(z.string(), z.unknown()).default(() => ({})).describe("Editor/build settings"),
}).meta({ title: "Project", description: "Projects collection schema" });

export type ProjectInput = z.infer<typeof ProjectSchema>;

// Status is free-form on purpose: queued|running|completed|failed by convention only
export const TuningJobSchema = z.object({
  project_id: z.string().nullable().default(null).describe("Associated project id"),
  model: z.string().default("arcyn-prime").describe("Model name"),
  objective: z.string().describe("What to optimize for"),
  dataset: z.string().nullable().default(null).describe("Dataset reference or URL"),
  status: z.string().default(DEFAULT_TUNING_JOB_STATUS).describe(TUNING_JOB_STATUSES.join("|")),
  params: z.record(z.string(), z.unknown()).default(() => ({})).describe("Hyperparameters"),
}).meta({ title: "TuningJob", description: "Model tuning jobs schema" });

export type TuningJobInput = z.infer<typeof TuningJobSchema>;

export const StatusUpdateSchema = z.object({
  status: z.string(),
});

export type StatusUpdate = z.infer<typeof StatusUpdateSchema>;

export const ListQuerySchema = z.object({
  // any integer; clampLimit caps it, so values past the safe range are fine here
  limit: z.coerce.number().refine(Number.isInteger, { message: "Expected an integer" }).optional(),
});

export const TuningJobListQuerySchema = ListQuerySchema.extend({
  project_id: z.string().optional(),
});

/** Validate a value at the request boundary, throwing ValidationError on failure. */
export function parseInput<T extends z.ZodType>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZod(result.error);
  }
  return result.data;
}

/** JSON Schema documents for the stored record kinds, keyed by collection name. */
export function modelJsonSchemas(): Record<string, unknown> {
  return {
    project: z.toJSONSchema(ProjectSchema, { io: "input" }),
    tuningjob: z.toJSONSchema(TuningJobSchema, { io: "input" }),
  };
}

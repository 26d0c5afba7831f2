import { Hono } from "hono";
import { StatusUpdateSchema, TuningJobListQuerySchema, TuningJobSchema, parseInput } from "../schemas.js";
import { requireStore, type DocumentStore } from "../store/index.js";
import { readJsonBody } from "../api/body.js";
import type { LifecycleSimulator } from "./lifecycle.js";
import { createTuningJob, getTuningJob, listTuningJobs, updateTuningJobStatus } from "./service.js";

export interface TuningJobsRouterOptions {
  store: DocumentStore | null;
  /** Started for every created job; null when there is no store to write to. */
  lifecycle: LifecycleSimulator | null;
}

export function createTuningJobsRouter({ store, lifecycle }: TuningJobsRouterOptions): Hono {
  const app = new Hono();

  app.get("/", async (c) => {
    const query = parseInput(TuningJobListQuerySchema, c.req.query());
    const items = await listTuningJobs(requireStore(store), {
      limit: query.limit,
      projectId: query.project_id,
    });
    return c.json({ items });
  });

  app.post("/", async (c) => {
    const input = parseInput(TuningJobSchema, await readJsonBody(c));
    const job = await createTuningJob(requireStore(store), input);

    // Runs after the response; the caller polls for progress
    lifecycle?.start(job.id);

    return c.json({ id: job.id.toString(), status: job.status });
  });

  app.get("/:id", async (c) => {
    const job = await getTuningJob(requireStore(store), c.req.param("id"));
    return c.json(job);
  });

  app.put("/:id/status", async (c) => {
    const { status } = parseInput(StatusUpdateSchema, await readJsonBody(c));
    const job = await updateTuningJobStatus(requireStore(store), c.req.param("id"), status);
    return c.json(job);
  });

  return app;
}

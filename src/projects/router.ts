import { Hono } from "hono";
import { ListQuerySchema, ProjectSchema, parseInput } from "../schemas.js";
import { requireStore, type DocumentStore } from "../store/index.js";
import { readJsonBody } from "../api/body.js";
import { createProject, getProject, listProjects } from "./service.js";

export function createProjectsRouter(store: DocumentStore | null): Hono {
  const app = new Hono();

  app.get("/", async (c) => {
    const { limit } = parseInput(ListQuerySchema, c.req.query());
    const items = await listProjects(requireStore(store), limit);
    return c.json({ items });
  });

  app.post("/", async (c) => {
    const input = parseInput(ProjectSchema, await readJsonBody(c));
    const created = await createProject(requireStore(store), input);
    return c.json(created);
  });

  app.get("/:id", async (c) => {
    const project = await getProject(requireStore(store), c.req.param("id"));
    return c.json(project);
  });

  return app;
}

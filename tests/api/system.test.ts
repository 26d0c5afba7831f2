import { describe, it, expect, vi } from "vitest";
import { MemoryDocumentStore } from "../../src/store/index.js";
import { diagnoseStore } from "../../src/api/system.js";
import { loadConfig } from "../../src/config.js";
import { createTestApp, readJson } from "../test-utils.js";

describe("system routes", () => {
  it("GET / reports liveness", async () => {
    const { app } = createTestApp();
    const res = await app.request("/");
    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({ message: "Forge backend running" });
  });

  it("GET /api/hello greets", async () => {
    const { app } = createTestApp();
    expect(await readJson(await app.request("/api/hello"))).toEqual({
      message: "Hello from the Forge backend API",
    });
  });

  it("GET /api/health reports whether a store is attached", async () => {
    const withStore = createTestApp().app;
    const withoutStore = createTestApp({ store: null }).app;
    expect(await readJson(await withStore.request("/api/health"))).toEqual({ ok: true, store: true });
    expect(await readJson(await withoutStore.request("/api/health"))).toEqual({ ok: true, store: false });
  });

  it("GET /schema exposes both models", async () => {
    const { app } = createTestApp({ store: null });
    const res = await app.request("/schema");
    expect(res.status).toBe(200);

    const body = await readJson<{ models: Record<string, { title: string; required: string[] }> }>(res);
    expect(Object.keys(body.models)).toEqual(["project", "tuningjob"]);
    expect(body.models.project!.title).toBe("Project");
    expect(body.models.tuningjob!.required).toEqual(["objective"]);
  });

  it("answers unknown routes with a JSON 404", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/nothing-here");
    expect(res.status).toBe(404);
    expect(await readJson(res)).toEqual({ error: "Not found" });
  });

  it("hides unexpected errors behind a 500", async () => {
    const store = new MemoryDocumentStore();
    vi.spyOn(store, "find").mockRejectedValue(new Error("socket hang up"));
    const { app } = createTestApp({ store });

    const res = await app.request("/api/projects");

    expect(res.status).toBe(500);
    expect(await readJson(res)).toEqual({ error: "Internal server error" });
  });
});

describe("CORS", () => {
  it("allows every origin on normal responses", async () => {
    const { app } = createTestApp();
    const res = await app.request("/", { headers: { Origin: "https://example.test" } });
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
  });

  it("keeps the headers on error responses", async () => {
    const { app } = createTestApp({ store: null });
    const res = await app.request("/api/projects");
    expect(res.status).toBe(503);
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
  });

  it("answers preflight requests", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/tuning-jobs", {
      method: "OPTIONS",
      headers: {
        Origin: "https://example.test",
        "Access-Control-Request-Method": "PUT",
        "Access-Control-Request-Headers": "content-type,x-trace-id",
      },
    });

    expect(res.status).toBe(204);
    expect(res.headers.get("Access-Control-Allow-Methods")).toBe("GET, POST, PUT, PATCH, DELETE, OPTIONS");
    expect(res.headers.get("Access-Control-Allow-Headers")).toBe("content-type,x-trace-id");
  });
});

describe("GET /test", () => {
  it("reports a missing store without failing", async () => {
    const { app } = createTestApp({ store: null, env: { DATABASE_URL: "" } });
    const res = await app.request("/test");

    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({
      backend: "running",
      database: "not available",
      database_url: "not set",
      database_name: null,
      connection_status: "not connected",
      collections: [],
    });
  });

  it("lists collections of a working store", async () => {
    const store = new MemoryDocumentStore("forge");
    await store.insert("project", { name: "alpha" });
    const { app } = createTestApp({ store });

    const res = await app.request("/test");

    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({
      backend: "running",
      database: "connected and working",
      database_url: "set",
      database_name: "forge",
      connection_status: "connected",
      collections: ["project"],
    });
  });

  it("summarizes store errors and still answers 200", async () => {
    const store = new MemoryDocumentStore("forge");
    vi.spyOn(store, "listCollections").mockRejectedValue(new Error("not authorized on forge to execute command"));
    const { app } = createTestApp({ store });

    const res = await app.request("/test");

    expect(res.status).toBe(200);
    const body = await readJson<{ database: string; connection_status: string }>(res);
    expect(body.database).toBe("connected but error: not authorized on forge to execute command");
    expect(body.connection_status).toBe("connected");
  });
});

describe("diagnoseStore", () => {
  it("caps the reported collections at ten", async () => {
    const store = new MemoryDocumentStore();
    for (let i = 0; i < 12; i++) {
      await store.insert(`c${i}`, { n: i });
    }

    const report = await diagnoseStore(loadConfig({ DATABASE_URL: "memory://" }), store);

    expect(report.collections).toEqual(["c0", "c1", "c2", "c3", "c4", "c5", "c6", "c7", "c8", "c9"]);
  });

  it("truncates long error messages to 80 characters", async () => {
    const store = new MemoryDocumentStore();
    vi.spyOn(store, "listCollections").mockRejectedValue(new Error("x".repeat(200)));

    const report = await diagnoseStore(loadConfig({}), store);

    expect(report.database).toBe(`connected but error: ${"x".repeat(80)}`);
  });
});

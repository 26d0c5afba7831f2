// System routes: liveness, greeting, store diagnostics and schema introspection
import { Hono } from "hono";
import type { Config } from "../config.js";
import { summarizeError } from "../errors.js";
import { log } from "../logger.js";
import { modelJsonSchemas } from "../schemas.js";
import type { DocumentStore } from "../store/index.js";

const MAX_REPORTED_COLLECTIONS = 10;

export interface StoreDiagnostic {
  backend: string;
  database: string;
  database_url: "set" | "not set";
  database_name: string | null;
  connection_status: "connected" | "not connected";
  collections: string[];
}

/** Probe the store. Never throws; failures are reported in the `database` field. */
export async function diagnoseStore(config: Config, store: DocumentStore | null): Promise<StoreDiagnostic> {
  const report: StoreDiagnostic = {
    backend: "running",
    database: "not available",
    database_url: config.databaseUrl ? "set" : "not set",
    database_name: null,
    connection_status: "not connected",
    collections: [],
  };

  if (!store) {
    return report;
  }

  report.database = "available";
  report.database_name = store.name;
  report.connection_status = "connected";

  try {
    const collections = await store.listCollections();
    report.collections = collections.slice(0, MAX_REPORTED_COLLECTIONS);
    report.database = "connected and working";
  } catch (err) {
    log.warn("system", "store diagnostic failed:", err);
    report.database = `connected but error: ${summarizeError(err)}`;
  }

  return report;
}

export interface SystemRouterOptions {
  config: Config;
  store: DocumentStore | null;
}

export function createSystemRouter({ config, store }: SystemRouterOptions): Hono {
  const app = new Hono();

  app.get("/", (c) => c.json({ message: "Forge backend running" }));

  app.get("/api/hello", (c) => c.json({ message: "Hello from the Forge backend API" }));

  app.get("/api/health", (c) => c.json({ ok: true, store: store !== null }));

  app.get("/test", async (c) => c.json(await diagnoseStore(config, store)));

  // Lets external tools inspect the record shapes
  app.get("/schema", (c) => c.json({ models: modelJsonSchemas() }));

  return app;
}

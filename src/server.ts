import { Hono } from "hono";
import { serve } from "@hono/node-server";
import type { Config } from "./config.js";
import { ApiError } from "./errors.js";
import { log } from "./logger.js";
import { createSystemRouter } from "./api/system.js";
import { createProjectsRouter } from "./projects/index.js";
import { createTuningJobsRouter, LifecycleSimulator } from "./tuning-jobs/index.js";
import type { DocumentStore } from "./store/index.js";

export interface AppOptions {
  config: Config;
  store: DocumentStore | null;
  /** Defaults to a simulator on `store` using `config.lifecycleStepMs`. */
  lifecycle?: LifecycleSimulator | null;
}

export interface ForgeServer {
  port: number;
  hostname: string;
  shutdown: () => Promise<void>;
}

export function createApp({ config, store, lifecycle }: AppOptions): Hono {
  const simulator = lifecycle !== undefined
    ? lifecycle
    : store
      ? new LifecycleSimulator(store, { stepDelayMs: config.lifecycleStepMs })
      : null;

  const app = new Hono();

  // Request logging middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    const ms = Date.now() - start;
    log.info("http", `${c.req.method} ${c.req.path} ${c.res.status} ${ms}ms`);
  });

  // CORS middleware, open to every origin
  app.use("*", async (c, next) => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Methods", "GET, POST, PUT, PATCH, DELETE, OPTIONS");
    c.header("Access-Control-Allow-Headers", c.req.header("Access-Control-Request-Headers") ?? "*");

    if (c.req.method === "OPTIONS") {
      return c.body(null, 204);
    }

    await next();
  });

  app.route("/", createSystemRouter({ config, store }));
  app.route("/api/projects", createProjectsRouter(store));
  app.route("/api/tuning-jobs", createTuningJobsRouter({ store, lifecycle: simulator }));

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  app.onError((err, c) => {
    if (err instanceof ApiError) {
      return c.json(err.toBody(), err.status);
    }
    log.error("http", `${c.req.method} ${c.req.path} failed:`, err);
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}

export function startServer(options: AppOptions): ForgeServer {
  const { config } = options;
  const app = createApp(options);

  const server = serve({
    fetch: app.fetch,
    port: config.port,
    hostname: config.host,
  });

  log.info("http", `server listening on http://${config.host}:${config.port}`);

  return {
    port: config.port,
    hostname: config.host,
    shutdown: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

import { loadConfig } from "./config.js";
import { log } from "./logger.js";
import { startServer } from "./server.js";
import { openStore } from "./store/index.js";
import { LifecycleSimulator } from "./tuning-jobs/index.js";

export { createApp, startServer, type AppOptions, type ForgeServer } from "./server.js";
export { loadConfig, ConfigError, type Config } from "./config.js";
export { log, setLogger, type Logger, type LogLevel } from "./logger.js";

export async function start(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const config = loadConfig(env);
  log.setLevel(config.logLevel);

  log.info("forge", `node: ${process.version}, platform: ${process.platform}`);

  const store = await openStore(config);
  if (!store) {
    log.warn("forge", "no document store — data routes will answer 503");
  }

  const lifecycle = store ? new LifecycleSimulator(store, { stepDelayMs: config.lifecycleStepMs }) : null;
  const server = startServer({ config, store, lifecycle });
  log.info("forge", "forge backend started");

  let stopping = false;
  async function shutdown(signal: string) {
    if (stopping) return;
    stopping = true;
    log.info("forge", `received ${signal}, shutting down…`);

    const pending = lifecycle?.activeRuns().length ?? 0;
    if (pending > 0) {
      log.warn("forge", `cancelling ${pending} tuning job lifecycle run(s)`);
    }
    await lifecycle?.stopAll();
    await server.shutdown();
    await store?.close();
    log.info("forge", "forge backend stopped");
  }

  function handleSignal(signal: string) {
    shutdown(signal).then(
      () => process.exit(0),
      (err) => {
        log.error("forge", "shutdown failed:", err);
        process.exit(1);
      },
    );
  }

  process.on("SIGINT", () => handleSignal("SIGINT"));
  process.on("SIGTERM", () => handleSignal("SIGTERM"));
  process.on("unhandledRejection", (err) => {
    log.error("forge", "unhandled rejection:", err);
  });
}

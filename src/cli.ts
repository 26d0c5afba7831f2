#!/usr/bin/env node

import fs from "fs";
import { fileURLToPath } from "url";
import { ConfigError, start } from "./index.js";

const arg = process.argv[2];

if (arg === "--version" || arg === "-v") {
  const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
  const pkg = JSON.parse(fs.readFileSync(pkgPath, "utf-8")) as { version?: string };
  console.log(`forge-backend ${pkg.version ?? "unknown"}`);
  process.exit(0);
}

if (arg === "--help" || arg === "-h") {
  console.log(`Usage: forge-backend

Environment:
  PORT                     listen port (default 8000)
  HOST                     listen address (default 0.0.0.0)
  DATABASE_URL             mongodb://… or memory://
  DATABASE_NAME            database name override
  FORGE_LOG_LEVEL          debug | info | warn | error (default info)
  FORGE_LIFECYCLE_STEP_MS  tuning job step delay in ms (default 2000)`);
  process.exit(0);
}

try {
  await start();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error("forge backend failed to start:", err);
  }
  process.exit(1);
}

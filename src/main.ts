#!/usr/bin/env node
/**
 * Daemon entry point: load configuration, start polling, stop on signals.
 */

import { ConfigError, loadConfig, type MonitorConfig } from "./config.js";
import { createMonitor } from "./index.js";

async function main(): Promise<void> {
  let config: MonitorConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[tunnelwatch] ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  console.log(
    `[tunnelwatch] Config: server=${config.serverName} (${config.serverLocation}), status=${config.statusPath}, log=${config.logPath}, interval=${config.pollIntervalMs / 1000}s`,
  );

  const monitor = createMonitor(config);

  const cleanup = () => monitor.stop();
  process.once("SIGTERM", cleanup);
  process.once("SIGINT", cleanup);

  await monitor.start();
}

main().catch((err) => {
  console.error("[tunnelwatch] Failed to start:", err);
  process.exitCode = 1;
});

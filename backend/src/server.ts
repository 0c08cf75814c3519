/**
 * otakeeper Agent — Server Entry Point
 *
 * Repairs any interrupted update, then starts the HTTP server. This is the
 * main entry point on the device. For tests, use app.ts directly with
 * supertest.
 */

import { UpdateEngine, createLogger, reconcile } from "@otakeeper/engine";
import { engineOptions, loadConfig } from "./config";
import { createApp } from "./app";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, name: "otakeeper-agent" });
  const options = engineOptions(config);

  // Must finish before uploads are accepted
  const repair = await reconcile(options, { logger });
  logger.info({ action: repair.action }, "Startup reconciliation finished");

  const engine = new UpdateEngine(options, { logger });
  await engine.init();

  const { app } = createApp(config, engine, logger);

  const server = app.listen(config.port, config.host, () => {
    logger.info(
      { host: config.host, port: config.port, env: config.env },
      "otakeeper agent listening",
    );
  });

  // Graceful shutdown
  const shutdown = () => {
    logger.info("Shutting down...");
    server.close(() => {
      engine.close();
      process.exit(0);
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  process.stderr.write(`Failed to start agent: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});

/**
 * Rowguard API Server
 *
 * Fastify entry point. Boots the engine, builds the app, starts listening.
 * SIGHUP re-reads the runtime configuration without a restart.
 */

import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
import { captureException, createLogger, flushObservability } from "@rowguard/platform";
import { bootstrap } from "./bootstrap.js";
import { buildApp } from "./app.js";

const logger = createLogger("api");

async function main() {
  const { config, configProvider, resolver } = bootstrap();

  const app = await buildApp({ config, resolver });

  await app.listen({
    port: config.api.port,
    host: config.api.host,
  });

  logger.info("API listening", { url: `http://localhost:${config.api.port}` });

  process.on("SIGHUP", () => {
    logger.info("SIGHUP received, reloading runtime configuration", { path: configProvider.path });
    configProvider.reload();
  });

  const shutdown = async () => {
    logger.info("Shutting down");
    await app.close();
    await flushObservability();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch(async (err) => {
  logger.error("Fatal error during startup", {
    error: err instanceof Error ? err.message : String(err),
  });
  captureException(err instanceof Error ? err : new Error(String(err)));
  await flushObservability().catch((flushError) => {
    console.error("Failed to flush observability", flushError);
  });
  process.exit(1);
});

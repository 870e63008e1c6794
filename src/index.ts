import "dotenv/config";
import { loadEngineConfigFromEnv } from "./config/env.js";
import { createRevisionEngine } from "./engine.js";
import { createAppLogger } from "./logger/index.js";
import { createApp } from "./server/app.js";

/**
 * Entry point: wires logger, configuration, engine and HTTP server.
 * Everything else lives in modules so the engine can be embedded directly.
 */
async function main() {
  const logger = createAppLogger({ serviceName: "revision-engine" });
  const config = loadEngineConfigFromEnv();
  const engine = createRevisionEngine(config, logger);
  const { app } = createApp({ logger, engine });

  app.listen(config.port, () => {
    logger.info("Server started", { port: config.port, env: process.env.NODE_ENV ?? "development" });
  });
}

main().catch((err) => {
  // startup failures are unrecoverable
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});

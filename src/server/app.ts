import express from "express";
import type { RevisionEngine } from "../engine.js";
import type { AppLogger } from "../logger/index.js";
import { requestContextMiddleware } from "./requestContext.js";
import { errorHandler } from "./errors.js";
import { createApiRouter } from "./routes/api.js";

/**
 * Express app around an already-built engine; the entry point and the
 * tests construct the engine, this only wires HTTP onto it.
 */
export function createApp(params: { logger: AppLogger; engine: RevisionEngine }) {
  const app = express();

  app.disable("x-powered-by");
  app.use(requestContextMiddleware(params.logger));
  app.use(express.json({ limit: "1mb" }));

  app.use("/api", createApiRouter({ logger: params.logger, engine: params.engine }));

  // error middleware goes last
  app.use(errorHandler(params.logger));

  return { app };
}

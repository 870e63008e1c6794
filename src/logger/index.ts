export { createAppLogger, createSilentLogger, type AppLogger, type AppLoggerOptions } from "./logger.js";

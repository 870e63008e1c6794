import winston from "winston";

export type AppLogger = winston.Logger;

export type AppLoggerOptions = {
  serviceName?: string;
  level?: string;
  /** Drop all output; used by tests. */
  silent?: boolean;
};

/**
 * Application logger (Winston).
 *
 * Every revision cycle fans out into assessments and provider attempts, so
 * log lines carry structured fields (`requestId`, `providerId`, `iteration`)
 * instead of interpolated strings.
 * - development: coloured console lines with the metadata appended
 * - production: one JSON object per line
 */
export function createAppLogger(opts?: AppLoggerOptions): AppLogger {
  const serviceName = opts?.serviceName ?? "revision-engine";
  const isProd = process.env.NODE_ENV === "production";

  const baseFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.metadata({
      fillExcept: ["message", "level", "timestamp", "service"],
    })
  );

  const consoleFormat = isProd
    ? winston.format.json()
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.printf((info) => {
          const metadata: unknown = info.metadata;
          const meta =
            metadata && typeof metadata === "object" && Object.keys(metadata).length
              ? ` ${JSON.stringify(metadata)}`
              : "";
          return `${String(info.timestamp)} ${info.level} [${serviceName}] ${String(info.message)}${meta}`;
        })
      );

  return winston.createLogger({
    level: opts?.level ?? process.env.LOG_LEVEL ?? (isProd ? "info" : "debug"),
    silent: opts?.silent ?? false,
    defaultMeta: { service: serviceName },
    format: baseFormat,
    transports: [new winston.transports.Console({ format: consoleFormat })],
  });
}

/** Logger that writes nothing. */
export function createSilentLogger(): AppLogger {
  return createAppLogger({ silent: true });
}

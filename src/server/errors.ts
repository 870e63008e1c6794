import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { ConfigurationError } from "../config/errors.js";
import type { AppLogger } from "../logger/index.js";

export class HttpError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.status = status;
    this.code = code;
  }
}

/**
 * JSON error envelope `{ ok: false, error: { code, message, requestId } }`.
 *
 * The full error (stack included) goes to the log; clients only see the
 * code and a short message, never the submitted text.
 */
export function errorHandler(baseLogger: AppLogger) {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const log = req.log ?? baseLogger;

    const httpErr = normalizeToHttpError(err);

    const details =
      err instanceof Error
        ? { name: err.name, message: err.message, stack: err.stack }
        : { err };

    log.log(httpErr.status >= 500 ? "error" : "warn", "Request failed: %s", httpErr.message, {
      status: httpErr.status,
      code: httpErr.code,
      path: req.path,
      method: req.method,
      ...details,
    });

    res.status(httpErr.status).json({
      ok: false,
      error: {
        code: httpErr.code,
        message: httpErr.message,
        requestId: req.ctx?.requestId,
      },
    });
  };
}

export function normalizeToHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) return err;

  if (err instanceof ZodError) {
    const first = err.issues[0];
    const where = first && first.path.length ? `${first.path.join(".")}: ` : "";
    return new HttpError(400, "INVALID_REQUEST", `Invalid request body${first ? ` (${where}${first.message})` : ""}`);
  }

  if (err instanceof ConfigurationError) {
    return new HttpError(500, err.code, err.message);
  }

  // body-parser failures carry a `type`
  const bodyErrorType = err instanceof Error && "type" in err && typeof err.type === "string" ? err.type : undefined;
  if (bodyErrorType === "entity.parse.failed") {
    return new HttpError(400, "INVALID_JSON", "Request body is not valid JSON");
  }
  if (bodyErrorType === "entity.too.large") {
    return new HttpError(413, "BODY_TOO_LARGE", "Request body is too large");
  }

  return new HttpError(500, "INTERNAL_ERROR", "Internal server error");
}

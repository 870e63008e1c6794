import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import type { AppLogger } from "../logger/index.js";

export type RequestId = string & { readonly __brand: "RequestId" };

export type RequestContext = {
  requestId: RequestId;
  /** Aborted when the client goes away before the response is sent. */
  signal: AbortSignal;
};

declare module "express-serve-static-core" {
  interface Request {
    ctx?: RequestContext;
    log?: AppLogger;
  }
}

function toRequestId(raw: string): RequestId {
  return raw as RequestId;
}

/**
 * Request context and per-request logging.
 *
 * - `requestId` comes from `x-request-id` or is generated, and is echoed back.
 * - `req.log` is a child logger carrying the requestId.
 * - `ctx.signal` lets long revision cycles stop when the caller disconnects.
 */
export function requestContextMiddleware(baseLogger: AppLogger) {
  return (req: Request, res: Response, next: NextFunction) => {
    const requestId = toRequestId((req.header("x-request-id") || randomUUID()).trim());
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    req.ctx = { requestId, signal: controller.signal };
    req.log = baseLogger.child({ requestId });
    res.setHeader("x-request-id", requestId);
    next();
  };
}

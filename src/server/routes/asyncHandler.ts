import type { Request, Response, NextFunction, RequestHandler } from "express";

/**
 * Lets routes use async/await and hands rejections to the error middleware.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}

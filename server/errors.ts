import type { NextFunction, Request, RequestHandler, Response } from "express";
import { ZodError } from "zod";
import { getConfig } from "./config.js";
import { errorContext, logger } from "./logger.js";

export class HttpError extends Error {
  readonly status: number;
  readonly details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.details = details;
  }
}

export const badRequest = (message: string, details?: unknown) => new HttpError(400, message, details);
export const notFound = (message: string) => new HttpError(404, message);
export const forbidden = (message = "Access denied") => new HttpError(403, message);
export const tooManyRequests = (message: string) => new HttpError(429, message);
export const serviceUnavailable = (message: string) => new HttpError(503, message);

/** safeParse failure as a 400 with zod's flattened issues. */
export const validationError = (err: ZodError) => new HttpError(400, "Invalid request", err.flatten());

/** Async route wrapper */
export function wrap(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/** http-errors style client error (body-parser's 413, serve-static's 404, ...). */
function isClientStatusError(err: unknown): err is Error & { status: number; expose?: unknown } {
  return (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  );
}

function isVerbose() {
  return getConfig().env !== "production";
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof HttpError) {
    if (err.status >= 500) logger.warn("Request failed", { path: req.path, status: err.status, ...errorContext(err) });
    const body: { error: string; details?: unknown } = { error: err.message };
    if (err.details !== undefined) body.details = err.details;
    return res.status(err.status).json(body);
  }

  if (err instanceof ZodError) {
    return res.status(400).json({ error: "Invalid request", details: err.flatten() });
  }

  // express.json() parse failures
  if (err instanceof SyntaxError && "body" in err) {
    return res.status(400).json({ error: "Malformed JSON body" });
  }

  if (isClientStatusError(err)) {
    return res.status(err.status).json({ error: err.expose === false ? "Request failed" : err.message });
  }

  logger.error("Unhandled error", { path: req.path, method: req.method, ...errorContext(err) });
  const message = isVerbose() && err instanceof Error ? err.message : "Server error";
  return res.status(500).json({ error: message });
}

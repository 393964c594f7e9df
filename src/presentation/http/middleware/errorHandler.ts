import type { ErrorRequestHandler, RequestHandler, Response } from "express";
import { PostStoreError } from "../../../domain/errors/PostErrors.js";
import { logger } from "../../../shared/utils/logger.js";

export interface ErrorBody {
  status: number;
  message: string;
}

function isBodyParseError(error: unknown): boolean {
  return (
    error instanceof Error && "type" in error && error.type === "entity.parse.failed"
  );
}

export function sendError(res: Response, status: number, message: string): void {
  const body: ErrorBody = { status, message };
  res.status(status).json(body);
}

export const notFoundHandler: RequestHandler = (_req, res) => {
  sendError(res, 404, "Resource not found");
};

export const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
  if (error instanceof PostStoreError) {
    sendError(res, error.status, error.message);
    return;
  }

  if (isBodyParseError(error)) {
    sendError(res, 400, "Malformed JSON body");
    return;
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  const errorStack = error instanceof Error ? error.stack : undefined;
  logger.error(
    { method: req.method, path: req.path, error: errorMessage, stack: errorStack },
    "Request failed"
  );
  sendError(res, 500, "Internal Server Error");
};

import { rateLimit, type RateLimitRequestHandler } from "express-rate-limit";
import { sendError } from "./errorHandler.js";
import { logger } from "../../../shared/utils/logger.js";

export interface RateLimitOptions {
  windowMs: number;
  max: number;
}

// Keyed by client IP
export function createRateLimiter(options: RateLimitOptions): RateLimitRequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.max,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    handler: (req, res, _next, limitOptions) => {
      logger.warn({ ip: req.ip, path: req.path }, "Rate limit exceeded");
      sendError(res, limitOptions.statusCode, "Too many requests");
    },
  });
}

import rateLimit from "express-rate-limit";
import { appConfig } from "../config.js";

export function createRateLimiter(options: { windowMs?: number; limit?: number } = {}) {
  return rateLimit({
    windowMs: options.windowMs ?? appConfig.RATE_LIMIT_WINDOW_MS,
    limit: options.limit ?? appConfig.RATE_LIMIT_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests", code: "RATE_LIMITED" }
  });
}

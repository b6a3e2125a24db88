import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { appConfig } from "./config.js";
import { requestLogger } from "./middleware/logger.js";
import { createRateLimiter } from "./middleware/rateLimiter.js";
import { createAskRouter } from "./routes/ask.js";
import { createHealthRouter } from "./routes/health.js";
import { toHttpError } from "./routes/httpErrors.js";
import { createIndexRouter } from "./routes/index.js";
import { createSessionsRouter } from "./routes/sessions.js";
import { logger } from "./utils/logger.js";

export interface AppRouters {
  ask?: express.Router;
  sessions?: express.Router;
  index?: express.Router;
  health?: express.Router;
}

export function createApp(routers: AppRouters = {}): express.Express {
  const app = express();

  app.use(requestLogger);
  app.use(cors({ origin: appConfig.CORS_ORIGIN }));
  app.use(express.json({ limit: "256kb" }));
  app.use(createRateLimiter());

  app.use("/api/ask", routers.ask ?? createAskRouter());
  app.use("/api/sessions", routers.sessions ?? createSessionsRouter());
  app.use("/api/index", routers.index ?? createIndexRouter());
  app.use("/api/health", routers.health ?? createHealthRouter());

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found", code: "NOT_FOUND" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body", code: "VALIDATION" });
      return;
    }
    const { status, body } = toHttpError(err);
    logger.error({ err, status }, "Unhandled error");
    res.status(status).json(body);
  });

  return app;
}

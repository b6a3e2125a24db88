import { Router } from "express";
import type { HealthResponse, ServiceCheckStatus } from "@siteqa/shared";
import { checkIndex, checkLlmConfiguration } from "../runtime/connectivity.js";
import { getSessionMemorySingleton, getSnapshotHolder } from "../runtime/qaRuntime.js";

interface CreateHealthRouterOptions {
  checkIndex?: () => ServiceCheckStatus;
  checkLlm?: () => ServiceCheckStatus;
  countSessions?: () => Promise<number>;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const indexCheck = options.checkIndex ?? (() => checkIndex(getSnapshotHolder()));
  const llmCheck = options.checkLlm ?? checkLlmConfiguration;
  const countSessions = options.countSessions ?? (() => getSessionMemorySingleton().count());
  const startTime = options.startTime ?? Date.now();

  const healthRouter = Router();

  healthRouter.get("/", async (_req, res, next) => {
    try {
      const index = indexCheck();
      const llm = llmCheck();
      const status: HealthResponse["status"] = index === "ok" && llm === "ok" ? "ok" : "degraded";

      const mem = process.memoryUsage();
      const response: HealthResponse = {
        status,
        timestamp: new Date().toISOString(),
        uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
        activeSessions: await countSessions(),
        checks: {
          index,
          llm
        },
        memoryUsage: {
          rss: mem.rss,
          heapUsed: mem.heapUsed,
          heapTotal: mem.heapTotal
        }
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return healthRouter;
}

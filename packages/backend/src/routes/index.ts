import { Router } from "express";
import type { IndexStatsResponse } from "@siteqa/shared";
import type { IndexSnapshot, IndexSnapshotHolder } from "../retrieval/IndexSnapshot.js";
import { getSnapshotHolder, reloadIndex } from "../runtime/qaRuntime.js";
import { logger } from "../utils/logger.js";
import { toHttpError } from "./httpErrors.js";

interface CreateIndexRouterOptions {
  holder?: IndexSnapshotHolder;
  /** Loads the persisted index and swaps it into the holder. */
  reload?: () => Promise<IndexSnapshot>;
}

export function createIndexRouter(options: CreateIndexRouterOptions = {}): Router {
  const holder = options.holder ?? getSnapshotHolder();
  const reload = options.reload ?? reloadIndex;

  const indexRouter = Router();

  indexRouter.get("/", (_req, res) => {
    const response: IndexStatsResponse = holder.stats();
    res.json(response);
  });

  indexRouter.post("/reload", async (_req, res) => {
    try {
      const snapshot = await reload();
      const response: IndexStatsResponse = snapshot.stats();
      res.json(response);
    } catch (error) {
      const { status, body } = toHttpError(error);
      logger.error({ err: error, status }, "Index reload failed");
      res.status(status).json(body);
    }
  });

  return indexRouter;
}

import { Router } from "express";
import { z } from "zod";
import type { ListSessionsResponse, SessionDetailResponse } from "@siteqa/shared";
import { validate } from "../middleware/validator.js";
import { getSessionMemorySingleton } from "../runtime/qaRuntime.js";
import type { SessionMemory } from "../services/SessionMemory.js";
import { summarizeSession } from "../services/sessionStoreTypes.js";

const sessionParamsSchema = z.object({
  id: z.string().min(1).max(200)
});

const listSessionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100)
});

interface CreateSessionsRouterOptions {
  memory?: SessionMemory;
}

export function createSessionsRouter(options: CreateSessionsRouterOptions = {}): Router {
  const memory = options.memory ?? getSessionMemorySingleton();

  const sessionsRouter = Router();

  sessionsRouter.get("/", validate({ query: listSessionsQuerySchema }), async (req, res, next) => {
    try {
      const { limit } = listSessionsQuerySchema.parse(req.query);
      const sessions = await memory.list(limit);
      const response: ListSessionsResponse = {
        total: sessions.length,
        sessions
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  sessionsRouter.get("/:id", validate({ params: sessionParamsSchema }), async (req, res, next) => {
    try {
      const session = await memory.peek(req.params.id ?? "");
      if (!session) {
        res.status(404).json({ error: "Session not found", code: "SESSION_NOT_FOUND" });
        return;
      }

      const response: SessionDetailResponse = {
        session: {
          ...summarizeSession(session),
          turns: session.turns
        }
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  sessionsRouter.delete("/:id", validate({ params: sessionParamsSchema }), async (req, res, next) => {
    try {
      const deleted = await memory.clear(req.params.id ?? "");
      if (!deleted) {
        res.status(404).json({ error: "Session not found", code: "SESSION_NOT_FOUND" });
        return;
      }
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return sessionsRouter;
}

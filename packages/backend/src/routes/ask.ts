import type { Request, Response } from "express";
import { Router } from "express";
import { z } from "zod";
import type { AskResponse } from "@siteqa/shared";
import { validate } from "../middleware/validator.js";
import { getQaServiceSingleton } from "../runtime/qaRuntime.js";
import type { QaResult, QaService, QaStreamEvent } from "../services/QaService.js";
import { logger } from "../utils/logger.js";
import { toHttpError } from "./httpErrors.js";

const askBodySchema = z.object({
  sessionId: z.string().trim().min(1).max(200),
  question: z.string().trim().min(1).max(4000)
});

type AskBody = z.infer<typeof askBodySchema>;

interface CreateAskRouterOptions {
  qaService?: Pick<QaService, "ask" | "streamAnswer">;
  heartbeatMs?: number;
}

function wantsSse(req: Request): boolean {
  const accepts = req.headers.accept ?? "";
  const streamFlag = req.query.stream;
  const streamRequested = typeof streamFlag === "string" && streamFlag.toLowerCase() === "true";
  return accepts.includes("text/event-stream") || streamRequested;
}

function sendSseEvent(res: Response, eventName: string, payload: unknown): void {
  res.write(`event: ${eventName}\n`);
  res.write(`data: ${JSON.stringify(payload)}\n\n`);
}

function toAskResponse(result: QaResult, startedAt: number): AskResponse {
  return {
    ...result,
    processingTimeMs: Date.now() - startedAt
  };
}

export function createAskRouter(options: CreateAskRouterOptions = {}): Router {
  const qaService = options.qaService ?? getQaServiceSingleton();
  const heartbeatMs = options.heartbeatMs ?? 15_000;

  const askRouter = Router();

  askRouter.post("/", validate({ body: askBodySchema }), async (req, res) => {
    const { sessionId, question }: AskBody = req.body;
    const startedAt = Date.now();

    if (!wantsSse(req)) {
      try {
        const result = await qaService.ask(sessionId, question);
        res.json(toAskResponse(result, startedAt));
      } catch (error) {
        const { status, body } = toHttpError(error);
        logger.error({ err: error, sessionId, status }, "Question answering failed");
        res.status(status).json(body);
      }
      return;
    }

    res.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    res.setHeader("Cache-Control", "no-cache, no-transform");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    sendSseEvent(res, "ack", { sessionId });
    const heartbeat = setInterval(() => {
      res.write(": heartbeat\n\n");
    }, heartbeatMs);

    let closed = false;
    res.on("close", () => {
      closed = true;
      clearInterval(heartbeat);
    });

    try {
      for await (const event of qaService.streamAnswer(sessionId, question)) {
        // leaving the loop stops the generator before the turn is recorded
        if (closed) {
          break;
        }
        emitQaEvent(res, event, startedAt);
      }
    } catch (error) {
      const { status, body } = toHttpError(error);
      logger.error({ err: error, sessionId, status }, "Question answering stream failed");
      if (!closed) {
        sendSseEvent(res, "error", { ...body, status });
      }
    } finally {
      clearInterval(heartbeat);
      if (!closed) {
        res.end();
      }
    }
  });

  return askRouter;
}

function emitQaEvent(res: Response, event: QaStreamEvent, startedAt: number): void {
  switch (event.type) {
    case "classification":
      sendSseEvent(res, "classification", event.classification);
      break;
    case "sources":
      sendSseEvent(res, "sources", { sources: event.sources, retrievedCount: event.retrievedCount });
      break;
    case "delta":
      sendSseEvent(res, "delta", { delta: event.delta });
      break;
    case "done":
      sendSseEvent(res, "done", toAskResponse(event.result, startedAt));
      break;
  }
}

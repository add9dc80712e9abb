import { Router, type Response } from "express";
import { z } from "zod";
import { DEFAULT_MODEL, listModels } from "../pricing/pricingTable.js";
import type { ChatService } from "./chatService.js";
import type { TurnEvent } from "./chatTypes.js";
import { describeError, isChatError } from "./errors.js";

const createSessionSchema = z.object({
  model: z.string().min(1).optional(),
});

const turnRequestSchema = z.object({
  message: z.string(),
});

export function statusForError(err: unknown): number {
  if (!isChatError(err)) {
    return 500;
  }
  switch (err.code) {
    case "not_found":
      return 404;
    case "empty_turn":
    case "unknown_model":
      return 400;
    case "out_of_order_turn":
    case "session_busy":
      return 409;
    default:
      return 500;
  }
}

function sendError(res: Response, err: unknown) {
  res.status(statusForError(err)).json({
    error: describeError(err),
    code: isChatError(err) ? err.code : "internal",
  });
}

export function buildChatRouter(chatService: ChatService): Router {
  const router = Router();

  router.get("/models", (_req, res) => {
    res.json({ models: listModels(), defaultModel: chatService.defaultModel ?? DEFAULT_MODEL });
  });

  router.get("/sessions", async (_req, res) => {
    try {
      res.json({ sessions: await chatService.listSessions() });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post("/sessions", (req, res) => {
    const parsed = createSessionSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid request payload", details: parsed.error.issues });
      return;
    }
    try {
      res.status(201).json(chatService.createSession(parsed.data.model));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get("/sessions/:sessionId", async (req, res) => {
    try {
      res.json(await chatService.getSession(req.params.sessionId));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post("/sessions/:sessionId/turns", async (req, res) => {
    const parsed = turnRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid request payload", details: parsed.error.issues });
      return;
    }

    // A client that goes away before or during the answer cancels the turn.
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    };
    res.on("close", onClose);

    let turn: AsyncGenerator<TurnEvent, void, undefined>;
    try {
      turn = await chatService.sendMessage(req.params.sessionId, parsed.data.message, {
        signal: controller.signal,
      });
    } catch (err) {
      res.off("close", onClose);
      sendError(res, err);
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const safeWrite = (chunk: string): boolean => {
      if (res.destroyed || res.writableEnded) {
        return false;
      }
      try {
        res.write(chunk);
        return true;
      } catch {
        return false;
      }
    };

    try {
      for await (const event of turn) {
        safeWrite(`data: ${JSON.stringify(event)}\n\n`);
      }
    } catch (err) {
      const failure: TurnEvent = {
        type: "failed",
        reason: "provider_error",
        message: describeError(err),
        partialText: "",
      };
      safeWrite(`data: ${JSON.stringify(failure)}\n\n`);
    } finally {
      res.off("close", onClose);
      if (!res.writableEnded) {
        res.end();
      }
    }
  });

  return router;
}

import { Router } from "express";
import { asyncHandler } from "../lib/async-handler";
import {
  assistantFeedbackRequestSchema,
  assistantSettingsRequestSchema,
  parseOr400,
  respondRequestSchema,
} from "../lib/validation";
import type { AssistantService } from "../services/assistant.service";

export function createAssistantRouter(assistant: AssistantService): Router {
  const router = Router();

  router.post("/respond", asyncHandler(async (req, res) => {
    const body = parseOr400(respondRequestSchema, req.body, res);
    if (!body) return;

    const result = await assistant.respond(body);
    res.status(result.success ? 200 : 502).json(result);
  }));

  router.post("/feedback", asyncHandler((req, res) => {
    const body = parseOr400(assistantFeedbackRequestSchema, req.body, res);
    if (!body) return;

    if (!assistant.cachedResponses(body.conversationId, body.query)) {
      res.status(404).json({ success: false, error: "No cached responses for this conversation and query" });
      return;
    }

    const success = assistant.provideFeedback(body);
    if (!success) {
      res.status(422).json({ success, error: "Feedback was not recorded" });
      return;
    }
    res.status(201).json({ success });
  }));

  router.get("/settings", asyncHandler((_req, res) => {
    res.json(assistant.settings);
  }));

  router.post("/settings", asyncHandler((req, res) => {
    const body = parseOr400(assistantSettingsRequestSchema, req.body, res);
    if (!body) return;
    if (body.autoSelectModel !== undefined) assistant.setAutoSelectModel(body.autoSelectModel);
    if (body.useGroupDiscussion !== undefined) assistant.setGroupDiscussion(body.useGroupDiscussion);
    res.json(assistant.settings);
  }));

  router.delete("/responses", asyncHandler((_req, res) => {
    assistant.clearResponses();
    res.status(204).end();
  }));

  return router;
}

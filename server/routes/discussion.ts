import { Router } from "express";
import { asyncHandler } from "../lib/async-handler";
import { discussionRequestSchema, idParamSchema, parseOr400 } from "../lib/validation";
import type { OptimizationManagerService } from "../services/optimization-manager.service";

export function createDiscussionRouter(manager: OptimizationManagerService): Router {
  const router = Router();

  router.post("/", asyncHandler(async (req, res) => {
    const body = parseOr400(discussionRequestSchema, req.body, res);
    if (!body) return;

    const result = await manager.conductDiscussion(body.query, {
      models: body.models,
      rounds: body.rounds,
      params: body.params,
    });
    res.status(result.success ? 200 : 422).json(result);
  }));

  router.get("/", asyncHandler((_req, res) => {
    const discussions = manager.discussions.listDiscussions().map((log) => ({
      id: log.id,
      query: log.query,
      models: log.models,
      rounds: log.rounds.length,
      startedAt: log.startedAt,
      completedAt: log.completedAt ?? null,
    }));
    res.json({ discussions });
  }));

  router.get("/:id", asyncHandler((req, res) => {
    const params = parseOr400(idParamSchema, req.params, res, "Invalid parameters");
    if (!params) return;

    const discussion = manager.discussions.getDiscussion(params.id);
    if (!discussion) {
      res.status(404).json({ error: "Discussion not found" });
      return;
    }
    res.json(discussion);
  }));

  return router;
}

import { Router } from "express";
import { asyncHandler } from "../lib/async-handler";
import {
  analyzeRequestSchema,
  conversationParamSchema,
  exportRequestSchema,
  feedbackRequestSchema,
  parseOr400,
  selectModelRequestSchema,
  toggleRequestSchema,
} from "../lib/validation";
import type { OptimizationManagerService } from "../services/optimization-manager.service";

export function createOptimizationRouter(manager: OptimizationManagerService): Router {
  const router = Router();

  router.post("/analyze", asyncHandler((req, res) => {
    const body = parseOr400(analyzeRequestSchema, req.body, res);
    if (!body) return;
    res.json(manager.optimizeQuery(body.query));
  }));

  router.post("/select-model", asyncHandler((req, res) => {
    const body = parseOr400(selectModelRequestSchema, req.body, res);
    if (!body) return;
    const model = manager.selectBestModel(body.query, undefined, body.candidates);
    res.json({ model });
  }));

  router.post("/feedback", asyncHandler((req, res) => {
    const body = parseOr400(feedbackRequestSchema, req.body, res);
    if (!body) return;
    const success = manager.processFeedback(body);
    res.status(success ? 201 : 202).json({ success });
  }));

  router.get("/feedback/should-request/:conversationId", asyncHandler((req, res) => {
    const params = parseOr400(conversationParamSchema, req.params, res, "Invalid parameters");
    if (!params) return;
    res.json({ shouldRequest: manager.shouldRequestFeedback(params.conversationId) });
  }));

  router.get("/stats", asyncHandler((_req, res) => {
    res.json(manager.getStats());
  }));

  router.post("/export", asyncHandler((req, res) => {
    const body = parseOr400(exportRequestSchema, req.body ?? {}, res);
    if (!body) return;
    const path = manager.exportFeedbackData(undefined, body);
    if (!path) {
      res.status(500).json({ error: "Export failed" });
      return;
    }
    res.json({ path });
  }));

  router.post("/toggle", asyncHandler((req, res) => {
    const body = parseOr400(toggleRequestSchema, req.body, res);
    if (!body) return;
    if (body.optimization !== undefined) manager.toggleOptimization(body.optimization);
    if (body.feedbackCollection !== undefined) manager.toggleFeedbackCollection(body.feedbackCollection);
    if (body.templateStrategy !== undefined) manager.templates.setStrategy(body.templateStrategy);
    res.json({
      optimization: manager.isEnabled,
      feedbackCollection: manager.collector.isEnabled,
      templateStrategy: manager.templates.currentStrategy,
    });
  }));

  router.get("/templates", asyncHandler((_req, res) => {
    const performance = manager.templates.getPerformance();
    res.json({
      strategy: manager.templates.currentStrategy,
      templates: manager.templates.getTemplates().map((template) => ({
        name: template.name,
        domains: template.domains,
        complexity: template.complexity,
        useCases: template.useCases,
        performance: performance[template.name] ?? null,
      })),
    });
  }));

  return router;
}

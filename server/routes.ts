import type { Express } from "express";
import type { IFeedbackStorage } from "./feedback-storage";
import type { InferenceProvider } from "./llm-client";
import { asyncHandler } from "./lib/async-handler";
import { createAssistantRouter } from "./routes/assistant";
import { createDiscussionRouter } from "./routes/discussion";
import { createOptimizationRouter } from "./routes/optimization";
import type { AssistantService } from "./services/assistant.service";
import type { OptimizationManagerService } from "./services/optimization-manager.service";

export interface AppServices {
  manager: OptimizationManagerService;
  assistant: AssistantService;
  provider: InferenceProvider;
  store: IFeedbackStorage;
}

export function registerRoutes(app: Express, services: AppServices): void {
  const { manager, assistant, provider, store } = services;

  app.get("/api/health", asyncHandler((_req, res) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      optimization: manager.isEnabled,
      feedbackCollection: manager.collector.isEnabled,
      feedbackSamples: store.getTotalCount(),
      models: provider.listModels(),
      circuits: provider.getCircuitStates?.() ?? [],
    });
  }));

  app.use("/api/optimization", createOptimizationRouter(manager));
  app.use("/api/discussions", createDiscussionRouter(manager));
  app.use("/api/assistant", createAssistantRouter(assistant));
}

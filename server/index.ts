import { createServer } from "http";
import { dirname, join } from "path";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { FeedbackStorage } from "./feedback-storage";
import { OpenAICompatibleProvider } from "./llm-client";
import logger from "./lib/logger";
import { serviceRegistry } from "./lib/service-registry";
import { AssistantService } from "./services/assistant.service";
import { OptimizationManagerService } from "./services/optimization-manager.service";

const config = loadConfig();

const store = new FeedbackStorage({
  dbPath: config.system.feedbackDbPath,
  backupDir: join(dirname(config.system.feedbackDbPath), "backups"),
});
const provider = new OpenAICompatibleProvider({ config: config.inference, models: config.models });
const manager = new OptimizationManagerService({ config, store, provider });
const assistant = new AssistantService({
  manager,
  provider,
  autoSelectModel: config.optimization.autoSelectModel,
  useGroupDiscussion: config.optimization.useGroupDiscussion,
  responseCacheSize: config.caches.responseCacheSize,
});

const app = createApp({ manager, assistant, provider, store });
const httpServer = createServer(app);

const host = process.env.NODE_ENV === "production" ? "127.0.0.1" : "0.0.0.0";
httpServer.listen(config.server.port, host, () => {
  logger.info(`serving on ${host}:${config.server.port}`, { models: provider.listModels() });
});

const shutdown = (): void => {
  logger.info("Shutting down gracefully...");
  serviceRegistry.destroyAll();

  httpServer.close(() => {
    logger.info("Server closed");
    process.exit(0);
  });
  setTimeout(() => {
    logger.warn("Forcing shutdown");
    process.exit(1);
  }, 5000).unref();
};

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import {
  appConfigSchema,
  modelConfigSchema,
  promptTemplateSchema,
  type AppConfig,
  type ModelConfig,
  type PromptTemplate,
} from "@shared/schema";
import { ConfigError, describeError } from "./lib/errors";
import logger, { setLogLevel } from "./lib/logger";

const baseConfigSchema = appConfigSchema.omit({ models: true, templates: true });
const modelsFileSchema = z.object({ models: z.array(modelConfigSchema) });
const templatesFileSchema = z.object({ templates: z.array(promptTemplateSchema) });

type BaseConfig = z.infer<typeof baseConfigSchema>;
type ParseResult<T> = { success: true; data: T } | { success: false; error: z.ZodError };

export interface LoadConfigOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
}

export function defaultConfig(): AppConfig {
  return appConfigSchema.parse({});
}

function readJsonFile(path: string): unknown {
  if (!existsSync(path)) {
    logger.warn("Config file not found, using defaults", { path });
    return undefined;
  }
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(path, `invalid JSON: ${describeError(error)}`);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/** Parses a file with its schema; a missing or invalid file yields `fallback`. */
function loadSection<T>(path: string, parse: (raw: unknown) => ParseResult<T>, fallback: T): T {
  try {
    const raw = readJsonFile(path);
    if (raw === undefined) return fallback;
    const result = parse(raw);
    if (!result.success) {
      throw new ConfigError(path, formatIssues(result.error));
    }
    return result.data;
  } catch (error) {
    logger.error("Invalid configuration, using defaults", { path, error: describeError(error) });
    return fallback;
  }
}

function parseIntEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value === "") return undefined;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    logger.warn("Ignoring non-numeric environment override", { name, value });
    return undefined;
  }
  return parsed;
}

export function applyEnvOverrides(base: BaseConfig, env: NodeJS.ProcessEnv): BaseConfig {
  const timeoutMs = parseIntEnv(env, "LLM_TIMEOUT_MS");
  const retryAttempts = parseIntEnv(env, "LLM_RETRY_ATTEMPTS");
  const port = parseIntEnv(env, "PORT");

  const merged = {
    ...base,
    system: {
      feedbackDbPath: env.FEEDBACK_DB_PATH || base.system.feedbackDbPath,
      rlhfExportDir: env.RLHF_EXPORT_DIR || base.system.rlhfExportDir,
    },
    inference: {
      ...base.inference,
      baseUrl: env.LLM_BASE_URL || base.inference.baseUrl,
      apiKey: env.LLM_API_KEY || base.inference.apiKey,
      timeoutMs: timeoutMs ?? base.inference.timeoutMs,
      retryAttempts: retryAttempts ?? base.inference.retryAttempts,
    },
    server: { port: port ?? base.server.port },
  };

  const result = baseConfigSchema.safeParse(merged);
  if (!result.success) {
    logger.error("Environment overrides rejected", { error: formatIssues(result.error) });
    return base;
  }
  return result.data;
}

/**
 * Reads `default.json`, `models.json` and `prompt-templates.json` from the
 * config directory. Each file falls back to defaults on its own.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const configDir = options.configDir ?? env.CONFIG_DIR ?? join(process.cwd(), "config");

  if (env.LOG_LEVEL) setLogLevel(env.LOG_LEVEL);

  const base = loadSection<BaseConfig>(
    join(configDir, "default.json"),
    (raw) => baseConfigSchema.safeParse(raw),
    baseConfigSchema.parse({}),
  );
  const models = loadSection<ModelConfig[]>(
    join(configDir, "models.json"),
    (raw) => modelsFileSchema.transform((file) => file.models).safeParse(raw),
    [],
  );
  const templates = loadSection<PromptTemplate[]>(
    join(configDir, "prompt-templates.json"),
    (raw) => templatesFileSchema.transform((file) => file.templates).safeParse(raw),
    [],
  );

  const config: AppConfig = { ...applyEnvOverrides(base, env), models, templates };
  logger.info("Configuration loaded", {
    configDir,
    models: models.length,
    templates: templates.length,
    dbPath: config.system.feedbackDbPath,
  });
  return config;
}

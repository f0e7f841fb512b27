import OpenAI from "openai";
import type { GenerationParams, GenerationResult, InferenceConfig, ModelConfig } from "@shared/schema";
import { CircuitBreakerGroup, CircuitOpenError, type CircuitSnapshot } from "./lib/circuit-breaker";
import { describeError } from "./lib/errors";
import { logger } from "./lib/logger";

export interface InferenceProvider {
  generate(
    model: string,
    prompt: string,
    systemPrompt?: string,
    params?: GenerationParams,
  ): Promise<GenerationResult>;
  listModels(): string[];
  getCircuitStates?(): CircuitSnapshot[];
}

export interface CompletionRequest {
  model: string;
  messages: Array<{ role: "system" | "user"; content: string }>;
  temperature: number;
  maxTokens: number;
}

export interface CompletionResponse {
  content: string;
  completionTokens?: number;
}

export type CompletionFn = (request: CompletionRequest) => Promise<CompletionResponse>;

export function createOpenAICompletion(config: InferenceConfig): CompletionFn {
  const client = new OpenAI({
    baseURL: config.baseUrl,
    apiKey: config.apiKey,
    timeout: config.timeoutMs,
    maxRetries: config.retryAttempts,
  });

  return async (request) => {
    const response = await client.chat.completions.create({
      model: request.model,
      messages: request.messages,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    });
    return {
      content: response.choices[0]?.message?.content ?? "",
      completionTokens: response.usage?.completion_tokens,
    };
  };
}

export interface OpenAICompatibleProviderOptions {
  config: InferenceConfig;
  models: ModelConfig[];
  completion?: CompletionFn;
  now?: () => number;
}

/**
 * Chat-completions provider for any OpenAI-compatible endpoint (Ollama,
 * LM Studio, vLLM). Only configured models are served; failures come back
 * as `success: false` results. Each model has its own circuit, so one
 * model that fails to load does not block the rest.
 */
export class OpenAICompatibleProvider implements InferenceProvider {
  private readonly config: InferenceConfig;
  private readonly models: Map<string, ModelConfig>;
  private readonly completion: CompletionFn;
  private readonly circuits: CircuitBreakerGroup;

  constructor(options: OpenAICompatibleProviderOptions) {
    this.config = options.config;
    this.models = new Map(options.models.map((model) => [model.name, model]));
    this.completion = options.completion ?? createOpenAICompletion(options.config);
    this.circuits = new CircuitBreakerGroup(
      "inference",
      {
        failureThreshold: options.config.circuitFailureThreshold,
        successThreshold: options.config.circuitSuccessThreshold,
        cooldownMs: options.config.circuitCooldownMs,
      },
      options.now,
    );
  }

  listModels(): string[] {
    return Array.from(this.models.keys());
  }

  async generate(
    model: string,
    prompt: string,
    systemPrompt?: string,
    params: GenerationParams = {},
  ): Promise<GenerationResult> {
    const modelConfig = this.models.get(model);
    if (!modelConfig) {
      return { response: "", success: false, error: `Model '${model}' is not configured` };
    }

    const system = systemPrompt ?? modelConfig.systemPrompt;
    const messages: CompletionRequest["messages"] = [];
    if (system) messages.push({ role: "system", content: system });
    messages.push({ role: "user", content: prompt });

    const startTime = Date.now();
    try {
      const result = await this.circuits.for(model).run(() =>
        this.completion({
          model,
          messages,
          temperature: params.temperature ?? this.config.temperature,
          maxTokens: params.maxTokens ?? this.config.maxTokens,
        }),
      );
      logger.llm("Completion finished", {
        model,
        durationMs: Date.now() - startTime,
        tokens: result.completionTokens,
      });
      return { response: result.content, success: true, tokenCount: result.completionTokens };
    } catch (error) {
      const message = describeError(error);
      if (error instanceof CircuitOpenError) {
        logger.warn("Inference circuit open, skipping call", { model, retryAfterMs: error.retryAfterMs });
      } else {
        logger.error("Completion failed", { model, durationMs: Date.now() - startTime, error: message });
      }
      return { response: "", success: false, error: message };
    }
  }

  getCircuitStates(): CircuitSnapshot[] {
    return this.circuits.snapshots();
  }
}

import { v4 as uuidv4 } from "uuid";
import { BaseService, ManagedMap } from "../lib/base-service";
import { describeError } from "../lib/errors";
import type { InferenceProvider } from "../llm-client";
import type { FeedbackScore, GenerationParams, QueryProfile } from "@shared/schema";
import type { OptimizationManagerService } from "./optimization-manager.service";

const GROUP_COMPLEXITY_THRESHOLD = 7;
const GROUP_MIN_COMPLEXITY = 3;
const UNANALYZED_LENGTH_THRESHOLD = 100;

export interface RespondInput {
  query: string;
  conversationId?: string;
  model?: string;
  useGroupDiscussion?: boolean;
  systemPrompt?: string;
  params?: GenerationParams;
}

export interface AssistantResponse {
  success: boolean;
  response: string;
  error?: string;
  conversationId: string;
  modelUsed: string | null;
  autoSelected: boolean;
  optimized: boolean;
  templateUsed: string;
  analysis: QueryProfile | null;
  groupDiscussion?: {
    discussionId: string;
    rounds: number;
    modelsUsed: string[];
    completionTime: number;
  };
  feedbackRequested: boolean;
  completionTime: number;
}

export interface AssistantFeedbackInput {
  conversationId: string;
  query: string;
  selectedResponse: string;
  score: FeedbackScore;
  feedbackText?: string | null;
}

export interface AssistantOptions {
  manager: OptimizationManagerService;
  provider: InferenceProvider;
  autoSelectModel: boolean;
  useGroupDiscussion: boolean;
  responseCacheSize: number;
}

/**
 * Whether a query is worth a multi-model discussion: very complex, or at
 * least moderately complex and calling for reasoning or creativity.
 */
export function isSuitableForGroupDiscussion(query: string, analysis: QueryProfile | null): boolean {
  if (!analysis) {
    return [...query].length > UNANALYZED_LENGTH_THRESHOLD && query.includes("?");
  }
  if (analysis.complexity > GROUP_COMPLEXITY_THRESHOLD) return true;
  return (analysis.requiresReasoning || analysis.requiresCreativity) && analysis.complexity >= GROUP_MIN_COMPLEXITY;
}

export interface AssistantSettings {
  autoSelectModel: boolean;
  useGroupDiscussion: boolean;
}

export class AssistantService extends BaseService {
  private readonly manager: OptimizationManagerService;
  private readonly provider: InferenceProvider;
  private autoSelectModel: boolean;
  private useGroupDiscussion: boolean;
  private readonly responseCache: ManagedMap<string, Record<string, string>>;

  constructor(options: AssistantOptions) {
    super("AssistantService");
    this.manager = options.manager;
    this.provider = options.provider;
    this.autoSelectModel = options.autoSelectModel;
    this.useGroupDiscussion = options.useGroupDiscussion;
    this.responseCache = this.createManagedMap<string, Record<string, string>>({
      maxSize: options.responseCacheSize,
      strategy: "lru",
    });
  }

  async respond(input: RespondInput): Promise<AssistantResponse> {
    const startTime = Date.now();
    const conversationId = input.conversationId ?? `conv_${uuidv4()}`;

    const optimization = this.manager.optimizeQuery(input.query);
    const prompt = optimization.optimizedPrompt;

    let model = input.model ?? null;
    let autoSelected = false;
    if (!model && this.autoSelectModel) {
      model = this.manager.selectBestModel(input.query, optimization.analysis ?? undefined);
      autoSelected = model !== null;
    }

    const base = {
      conversationId,
      optimized: optimization.analysis !== null,
      templateUsed: optimization.templateUsed,
      analysis: optimization.analysis,
    };

    const wantsGroup = input.useGroupDiscussion ?? this.useGroupDiscussion;
    if (wantsGroup && isSuitableForGroupDiscussion(input.query, optimization.analysis)) {
      const discussion = await this.manager.conductDiscussion(prompt, { params: input.params });
      if (discussion.success) {
        const groupName = this.manager.discussions.name;
        this.cacheResponse(conversationId, input.query, groupName, discussion.response);
        return {
          ...base,
          success: true,
          response: discussion.response,
          modelUsed: groupName,
          autoSelected: false,
          groupDiscussion: {
            discussionId: discussion.discussionId,
            rounds: discussion.rounds,
            modelsUsed: discussion.modelsUsed,
            completionTime: discussion.completionTime,
          },
          feedbackRequested: this.manager.shouldRequestFeedback(conversationId),
          completionTime: (Date.now() - startTime) / 1000,
        };
      }
      this.logWarn("Group discussion failed, falling back to a single model", { error: discussion.error });
    }

    const target = model ?? this.provider.listModels()[0] ?? null;
    if (target === null) {
      return {
        ...base,
        success: false,
        response: "",
        error: "No model available to answer the query",
        modelUsed: null,
        autoSelected,
        feedbackRequested: false,
        completionTime: (Date.now() - startTime) / 1000,
      };
    }

    try {
      const result = await this.provider.generate(target, prompt, input.systemPrompt, input.params);
      if (result.success) {
        this.cacheResponse(conversationId, input.query, target, result.response);
      }
      return {
        ...base,
        success: result.success,
        response: result.response,
        error: result.error,
        modelUsed: target,
        autoSelected,
        feedbackRequested: result.success && this.manager.shouldRequestFeedback(conversationId),
        completionTime: (Date.now() - startTime) / 1000,
      };
    } catch (error) {
      this.logError("Error generating response", { model: target, error: describeError(error) });
      return {
        ...base,
        success: false,
        response: "",
        error: describeError(error),
        modelUsed: target,
        autoSelected,
        feedbackRequested: false,
        completionTime: (Date.now() - startTime) / 1000,
      };
    }
  }

  /** Forwards feedback on a previously answered query, with every cached answer for it. */
  provideFeedback(input: AssistantFeedbackInput): boolean {
    const responses = this.cachedResponses(input.conversationId, input.query);
    if (!responses) {
      this.logWarn("No cached responses for feedback", { conversationId: input.conversationId });
      return false;
    }

    return this.manager.processFeedback({
      conversationId: input.conversationId,
      query: input.query,
      responses,
      selectedResponse: input.selectedResponse,
      score: input.score,
      feedbackText: input.feedbackText,
    });
  }

  cachedResponses(conversationId: string, query: string): Record<string, string> | undefined {
    const cached = this.responseCache.get(cacheKey(conversationId, query));
    return cached ? { ...cached } : undefined;
  }

  get settings(): AssistantSettings {
    return { autoSelectModel: this.autoSelectModel, useGroupDiscussion: this.useGroupDiscussion };
  }

  setAutoSelectModel(enabled: boolean): void {
    this.autoSelectModel = enabled;
  }

  setGroupDiscussion(enabled: boolean): void {
    this.useGroupDiscussion = enabled;
  }

  clearResponses(): void {
    this.responseCache.clear();
  }

  destroy(): void {
    this.responseCache.clear();
    this.unregister();
  }

  private cacheResponse(conversationId: string, query: string, model: string, response: string): void {
    const key = cacheKey(conversationId, query);
    const existing = this.responseCache.get(key) ?? {};
    this.responseCache.set(key, { ...existing, [model]: response });
  }
}

function cacheKey(conversationId: string, query: string): string {
  return `${conversationId}\u0000${query}`;
}

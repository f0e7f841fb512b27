import { BaseService } from "../lib/base-service";
import { describeError } from "../lib/errors";
import type { IFeedbackStorage } from "../feedback-storage";
import type { InferenceProvider } from "../llm-client";
import {
  resolveFeedbackScore,
  type AppConfig,
  type DiscussionResult,
  type FeedbackScore,
  type ModelStats,
  type QueryProfile,
  type QueryRules,
  type TemplatePerformance,
} from "@shared/schema";
import { FeedbackCollectorService } from "./feedback-collector.service";
import { GroupDiscussionService, type DiscussionOptions } from "./group-discussion.service";
import { PreferenceOptimizerService } from "./preference-optimizer.service";
import { defaultQueryRules, QueryAnalyzerService } from "./query-analyzer.service";
import type { ExportOptions } from "./rlhf-export.service";
import { DEFAULT_TEMPLATE, TemplateSelectorService } from "./template-selector.service";

const POSITIVE_SAMPLE_MIN = 0.7;
const NEGATIVE_SAMPLE_MAX = 0.3;

export interface OptimizationResult {
  analysis: QueryProfile | null;
  optimizedPrompt: string;
  templateUsed: string;
}

export interface ProcessFeedbackInput {
  conversationId: string;
  query: string;
  responses: Record<string, string>;
  selectedResponse: string;
  score: FeedbackScore;
  feedbackText?: string | null;
}

export interface OptimizationStats {
  enabled: boolean;
  feedbackCollection: {
    enabled: boolean;
    totalSamples: number;
    positiveSamples: number;
    negativeSamples: number;
    neutralSamples: number;
  };
  modelPreferences: Record<string, number>;
  modelStats: Record<string, ModelStats>;
  templatePerformance: Record<string, TemplatePerformance>;
  cacheSizes: {
    analysis: number;
    cachedFeedback: number;
  };
}

export interface OptimizationManagerDeps {
  config: AppConfig;
  store: IFeedbackStorage;
  provider: InferenceProvider;
  rules?: QueryRules;
  random?: () => number;
  now?: () => Date;
}

/**
 * Single entry point for query optimization, model routing and the feedback
 * loop. Public methods never throw; when disabled they return neutral values.
 */
export class OptimizationManagerService extends BaseService {
  readonly analyzer: QueryAnalyzerService;
  readonly templates: TemplateSelectorService;
  readonly preferences: PreferenceOptimizerService;
  readonly collector: FeedbackCollectorService;
  readonly discussions: GroupDiscussionService;
  private readonly store: IFeedbackStorage;
  private readonly config: AppConfig;
  private enabled: boolean;

  constructor(deps: OptimizationManagerDeps) {
    super("OptimizationManagerService");
    const { config } = deps;
    const rules = deps.rules ?? defaultQueryRules;

    this.config = config;
    this.store = deps.store;
    this.enabled = config.optimization.enabled;

    this.analyzer = new QueryAnalyzerService({ cacheSize: config.caches.analysisCacheSize, rules });
    this.templates = new TemplateSelectorService({
      templates: config.templates,
      strategy: config.promptOptimization.templateSelectionStrategy,
      dynamicInstructionTuning: config.promptOptimization.dynamicInstructionTuning,
      usageCacheSize: config.caches.templateUsageSize,
    });
    this.preferences = new PreferenceOptimizerService({
      models: config.models,
      groupDiscussion: config.groupDiscussion,
      preference: config.preference,
      performanceCacheSize: config.caches.performanceCacheSize,
      stopWords: rules.stopWords,
      queryTypeOf: (query) => this.analyzer.analyze(query).queryType,
    });
    this.collector = new FeedbackCollectorService(deps.store, {
      config: config.feedback,
      askedConversationsSize: config.caches.askedConversationsSize,
      evalRatio: config.export.evalRatio,
      random: deps.random,
      now: deps.now,
    });
    this.discussions = new GroupDiscussionService({
      provider: deps.provider,
      models: config.models,
      config: config.groupDiscussion,
      logSize: config.caches.discussionLogSize,
      random: deps.random,
    });
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  optimizeQuery(query: string): OptimizationResult {
    const passthrough: OptimizationResult = { analysis: null, optimizedPrompt: query, templateUsed: DEFAULT_TEMPLATE.name };
    if (!this.enabled) return passthrough;

    try {
      const analysis = this.analyzer.analyze(query);
      const template = this.templates.select(analysis);
      const optimizedPrompt = this.templates.compose(query, analysis, template);
      this.templates.recordUsage(query, template.name);
      return { analysis, optimizedPrompt, templateUsed: template.name };
    } catch (error) {
      this.logError("Error optimizing query", { error: describeError(error) });
      return passthrough;
    }
  }

  selectBestModel(query: string, analysis?: QueryProfile, candidates?: readonly string[]): string | null {
    if (!this.enabled) return null;

    try {
      const profile = analysis ?? this.analyzer.analyze(query);
      return this.preferences.selectBestModel(profile, candidates);
    } catch (error) {
      this.logError("Error selecting best model", { error: describeError(error) });
      return null;
    }
  }

  /**
   * Stores the feedback, then (only if it was stored) moves the selected
   * model's weight and credits the template that produced the prompt.
   */
  processFeedback(input: ProcessFeedbackInput): boolean {
    if (!this.enabled) return false;

    try {
      const feedbackId = this.collector.collectFeedback(input);
      if (feedbackId === null) return false;

      this.preferences.updateWeightsFromFeedback(input.query, input.responses, input.selectedResponse, input.score);

      const score = resolveFeedbackScore(input.score);
      if (score !== null) {
        const templateName = this.templates.templateUsedFor(input.query) ?? DEFAULT_TEMPLATE.name;
        this.templates.updatePerformance(templateName, score);
        this.store.updateStat("feedback_score", score, { model: input.selectedResponse, template: templateName });
      }
      return true;
    } catch (error) {
      this.logError("Error processing feedback", { error: describeError(error) });
      return false;
    }
  }

  shouldRequestFeedback(conversationId: string): boolean {
    if (!this.enabled) return false;
    try {
      return this.collector.shouldRequestFeedback(conversationId);
    } catch (error) {
      this.logError("Error deciding on feedback request", { error: describeError(error) });
      return false;
    }
  }

  exportFeedbackData(exportDir?: string, options: ExportOptions = {}): string {
    if (!this.enabled) return "";
    try {
      return this.collector.exportFeedbackData(exportDir ?? this.config.system.rlhfExportDir, options);
    } catch (error) {
      this.logError("Error exporting feedback data", { error: describeError(error) });
      return "";
    }
  }

  async conductDiscussion(query: string, options: DiscussionOptions = {}): Promise<DiscussionResult> {
    if (!this.enabled) return { success: false, error: "Optimization disabled" };
    try {
      return await this.discussions.conductDiscussion(query, options);
    } catch (error) {
      this.logError("Error during group discussion", { error: describeError(error) });
      return { success: false, error: describeError(error) };
    }
  }

  getStats(): OptimizationStats {
    const total = this.store.getTotalCount();
    const positive = this.store.getCountByScore(POSITIVE_SAMPLE_MIN);
    const negative = this.store.getCountByScore(undefined, NEGATIVE_SAMPLE_MAX);
    // boundaries are inclusive on both ends, matching the positive/negative counts
    const neutral = this.store.getCountByScore(NEGATIVE_SAMPLE_MAX, POSITIVE_SAMPLE_MIN);

    return {
      enabled: this.enabled,
      feedbackCollection: {
        enabled: this.collector.isEnabled,
        totalSamples: total,
        positiveSamples: positive,
        negativeSamples: negative,
        neutralSamples: neutral,
      },
      modelPreferences: this.preferences.getModelWeights(),
      modelStats: this.preferences.getModelStats(),
      templatePerformance: this.templates.getPerformance(),
      cacheSizes: {
        analysis: this.analyzer.cacheSize,
        cachedFeedback: this.collector.cachedFeedbackCount,
      },
    };
  }

  toggleOptimization(enabled: boolean): void {
    this.enabled = enabled;
    this.log(enabled ? "Optimization enabled" : "Optimization disabled");
  }

  toggleFeedbackCollection(enabled: boolean): void {
    this.collector.toggleCollection(enabled);
  }

  clearCaches(): void {
    this.analyzer.clearCache();
    this.preferences.clearCache();
    this.templates.clearUsage();
    this.log("Optimization caches cleared");
  }

  destroy(): void {
    this.discussions.destroy();
    this.collector.destroy();
    this.preferences.destroy();
    this.templates.destroy();
    this.analyzer.destroy();
    this.unregister();
  }
}

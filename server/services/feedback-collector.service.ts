import { v4 as uuidv4 } from "uuid";
import { BaseService, ManagedMap } from "../lib/base-service";
import { describeError } from "../lib/errors";
import type { IFeedbackStorage } from "../feedback-storage";
import { resolveFeedbackScore, type FeedbackConfig, type FeedbackRecord, type FeedbackScore } from "@shared/schema";
import { buildExportBundle, writeExportFile, type ExportOptions } from "./rlhf-export.service";

const CACHE_EVICTION_BATCH = 100;

export interface FeedbackCollectorOptions {
  config: FeedbackConfig;
  askedConversationsSize: number;
  evalRatio: number;
  random?: () => number;
  now?: () => Date;
}

export interface CollectFeedbackInput {
  conversationId: string;
  query: string;
  responses: Record<string, string>;
  selectedResponse: string;
  score: FeedbackScore;
  feedbackText?: string | null;
}

export class FeedbackCollectorService extends BaseService {
  private readonly store: IFeedbackStorage;
  private enabled: boolean;
  private readonly collectionProbability: number;
  private readonly collectComparisons: boolean;
  private readonly feedbackCacheSize: number;
  private readonly evalRatio: number;
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly feedbackCache: ManagedMap<string, FeedbackRecord>;
  private readonly askedConversations: ManagedMap<string, true>;

  constructor(store: IFeedbackStorage, options: FeedbackCollectorOptions) {
    super("FeedbackCollectorService");
    this.store = store;
    this.enabled = options.config.enabled;
    this.collectionProbability = options.config.collectionProbability;
    this.collectComparisons = options.config.collectComparisons;
    this.feedbackCacheSize = options.config.feedbackCacheSize;
    this.evalRatio = options.evalRatio;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    // hard ceiling above the soft limit; the batch eviction below normally keeps it lower
    this.feedbackCache = this.createManagedMap<string, FeedbackRecord>({
      maxSize: this.feedbackCacheSize + CACHE_EVICTION_BATCH,
      strategy: "fifo",
    });
    this.askedConversations = this.createManagedMap<string, true>({
      maxSize: options.askedConversationsSize,
      strategy: "lru",
    });
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  get cachedFeedbackCount(): number {
    return this.feedbackCache.size;
  }

  getCachedFeedback(id: string): FeedbackRecord | undefined {
    return this.feedbackCache.get(id);
  }

  /** Persists one piece of feedback and any pairwise comparisons it implies. */
  collectFeedback(input: CollectFeedbackInput): string | null {
    if (!this.enabled) return null;

    try {
      const record: FeedbackRecord = {
        id: `fb_${uuidv4()}`,
        timestamp: this.now().toISOString(),
        conversationId: input.conversationId,
        query: input.query,
        responses: { ...input.responses },
        selectedResponse: input.selectedResponse,
        feedbackScore: resolveFeedbackScore(input.score),
        feedbackText: input.feedbackText ?? null,
        metadata: { scoreKind: input.score.kind },
      };

      const feedbackId = this.store.saveFeedback(record);
      if (feedbackId === null) {
        this.logWarn("Feedback was not persisted", { conversationId: input.conversationId });
        return null;
      }

      this.cacheFeedback(record);

      if (this.collectComparisons && Object.keys(input.responses).length > 1) {
        this.createPairwiseComparisons(record);
      }

      return feedbackId;
    } catch (error) {
      this.logError("Error collecting feedback", { error: describeError(error) });
      return null;
    }
  }

  /** Random draw at the configured rate, at most once per conversation. */
  shouldRequestFeedback(conversationId: string): boolean {
    if (!this.enabled) return false;
    if (this.askedConversations.has(conversationId)) return false;

    const shouldRequest = this.random() < this.collectionProbability;
    if (shouldRequest) {
      this.askedConversations.set(conversationId, true);
    }
    return shouldRequest;
  }

  exportFeedbackData(exportDir: string, options: ExportOptions = {}): string {
    try {
      const records = this.store.getAllFeedback();
      const bundle = buildExportBundle(records, {
        ...options,
        evalRatio: options.evalRatio ?? this.evalRatio,
        random: options.random ?? this.random,
      });
      const filePath = writeExportFile(exportDir, bundle, options.format ?? "json", this.now());
      this.log("Exported feedback data", { path: filePath, records: bundle.metadata.recordCount });
      return filePath;
    } catch (error) {
      this.logError("Error exporting feedback data", { dir: exportDir, error: describeError(error) });
      return "";
    }
  }

  toggleCollection(enabled: boolean): void {
    this.enabled = enabled;
    this.log(enabled ? "Feedback collection enabled" : "Feedback collection disabled");
  }

  clearCaches(): void {
    this.feedbackCache.clear();
    this.askedConversations.clear();
  }

  destroy(): void {
    this.clearCaches();
    this.unregister();
  }

  private cacheFeedback(record: FeedbackRecord): void {
    this.feedbackCache.set(record.id, record);
    if (this.feedbackCache.size > this.feedbackCacheSize) {
      const evicted = this.feedbackCache.evictOldest(CACHE_EVICTION_BATCH);
      this.logDebug("Evicted oldest cached feedback", { evicted });
    }
  }

  private createPairwiseComparisons(record: FeedbackRecord): void {
    const chosen = record.responses[record.selectedResponse];
    if (!chosen) return;

    for (const [model, response] of Object.entries(record.responses)) {
      if (model === record.selectedResponse || !response) continue;

      const saved = this.store.saveComparison({
        id: `comp_${uuidv4()}`,
        timestamp: record.timestamp,
        conversationId: record.conversationId,
        query: record.query,
        chosen,
        rejected: response,
        chosenModel: record.selectedResponse,
        rejectedModel: model,
        metadata: { feedbackId: record.id },
      });
      if (saved === null) {
        this.logWarn("Comparison was not persisted", { feedbackId: record.id, rejectedModel: model });
      }
    }
  }
}

import { z } from "zod";
import { sqliteTable, text, real, index } from "drizzle-orm/sqlite-core";
import { createInsertSchema } from "drizzle-zod";

// ---------------------------------------------------------------------------
// Vocabularies
// ---------------------------------------------------------------------------

export const capabilityCategories = [
  "programming",
  "analysis",
  "creative",
  "reasoning",
  "math",
  "language",
  "technical_explanation",
  "evaluation",
  "critical_thinking",
  "problem_solving",
  "algorithms",
  "conciseness",
  "clarity",
  "summarization",
  "general_knowledge",
  "communication",
  "balanced",
  "comprehensive",
  "thorough",
] as const;

export type Capability = typeof capabilityCategories[number];

export const domains = [
  "technology",
  "business",
  "science",
  "health",
  "education",
  "arts",
  "lifestyle",
  "general",
] as const;

export type Domain = typeof domains[number];

export const queryTypes = [
  "how_to",
  "why",
  "what_is",
  "comparison",
  "example",
  "list",
  "opinion",
  "prediction",
  "question",
  "statement",
] as const;

export type QueryType = typeof queryTypes[number];

export const formatRequirements = [
  "list",
  "step_by_step",
  "examples",
  "summary",
  "comparison",
  "pros_cons",
  "table",
  "diagram",
] as const;

export type FormatRequirement = typeof formatRequirements[number];

export const languages = ["chinese", "english", "unknown"] as const;

export type Language = typeof languages[number];

export const GROUP_DISCUSSION_MODEL = "group_discussion";

// ---------------------------------------------------------------------------
// Query analysis
// ---------------------------------------------------------------------------

export const queryProfileSchema = z.object({
  complexity: z.number().min(0).max(10),
  domain: z.enum(domains),
  topics: z.array(z.string()),
  queryType: z.enum(queryTypes),
  formatRequirements: z.array(z.enum(formatRequirements)),
  requiresCode: z.boolean(),
  requiresReasoning: z.boolean(),
  requiresCreativity: z.boolean(),
  languages: z.array(z.enum(languages)).min(1),
  sentiment: z.enum(["positive", "negative", "neutral"]),
  urgency: z.enum(["high", "normal"]),
});

export type QueryProfile = z.infer<typeof queryProfileSchema>;

const keywordList = z.array(z.string().min(1));

export const queryRulesSchema = z.object({
  complexityIndicators: keywordList,
  domains: z.array(z.object({ name: z.enum(domains), keywords: keywordList })),
  queryTypes: z.array(z.object({ type: z.enum(queryTypes), keywords: keywordList })),
  formatRequirements: z.array(z.object({ flag: z.enum(formatRequirements), keywords: keywordList })),
  capabilities: z.object({
    code: keywordList,
    reasoning: keywordList,
    creativity: keywordList,
  }),
  sentiment: z.object({
    positive: keywordList,
    negative: keywordList,
  }),
  urgency: keywordList,
  stopWords: keywordList,
});

export type QueryRules = z.infer<typeof queryRulesSchema>;

// ---------------------------------------------------------------------------
// Feedback scores
// ---------------------------------------------------------------------------

export type FeedbackScore =
  | { kind: "scalar"; value: number }
  | { kind: "range"; low: number; high: number }
  | { kind: "absent" };

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

/** Collapses a score to a value in [0, 1], or null when none was given. */
export function resolveFeedbackScore(score: FeedbackScore): number | null {
  switch (score.kind) {
    case "scalar":
      return Number.isFinite(score.value) ? clampUnit(score.value) : null;
    case "range": {
      const midpoint = (score.low + score.high) / 2;
      return Number.isFinite(midpoint) ? clampUnit(midpoint) : null;
    }
    case "absent":
      return null;
  }
}

export function toFeedbackScore(value: number | { low: number; high: number } | null | undefined): FeedbackScore {
  if (value === null || value === undefined) return { kind: "absent" };
  if (typeof value === "number") return { kind: "scalar", value };
  return { kind: "range", low: value.low, high: value.high };
}

/** Accepts `0.8`, `{ low: 0.6, high: 0.9 }` or nothing. */
export const feedbackScoreInputSchema = z
  .union([z.number(), z.object({ low: z.number(), high: z.number() }), z.null()])
  .optional()
  .transform(toFeedbackScore);

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

const strengthsSchema = z.record(z.string(), z.number().min(0).max(1)).default({});

export const modelConfigSchema = z.object({
  name: z.string().min(1),
  role: z.string().default("assistant"),
  description: z.string().optional(),
  systemPrompt: z.string().default(""),
  strengths: strengthsSchema,
});

export type ModelConfig = z.infer<typeof modelConfigSchema>;

export const groupDiscussionConfigSchema = z.object({
  name: z.string().default(GROUP_DISCUSSION_MODEL),
  description: z.string().optional(),
  systemPrompt: z
    .string()
    .default("You are a group of expert models collaborating to produce the best possible answer."),
  strengths: strengthsSchema,
  defaultRounds: z.number().int().min(1).max(10).default(2),
});

export type GroupDiscussionConfig = z.infer<typeof groupDiscussionConfigSchema>;

export const templateComplexitySchema = z.enum(["low", "medium", "high"]);

export type TemplateComplexity = z.infer<typeof templateComplexitySchema>;

export const promptTemplateSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  domains: z.array(z.string()).default(["general"]),
  complexity: templateComplexitySchema.default("medium"),
  useCases: z.array(z.string()).default([]),
  template: z.string().min(1),
});

export type PromptTemplate = z.infer<typeof promptTemplateSchema>;

export const templateSelectionStrategySchema = z.enum(["best_match", "performance_based"]);

export type TemplateSelectionStrategy = z.infer<typeof templateSelectionStrategySchema>;

export const feedbackConfigSchema = z.object({
  enabled: z.boolean().default(true),
  collectionProbability: z.number().min(0).max(1).default(0.3),
  collectComparisons: z.boolean().default(true),
  feedbackCacheSize: z.number().int().positive().default(1000),
});

export type FeedbackConfig = z.infer<typeof feedbackConfigSchema>;

export const preferenceConfigSchema = z
  .object({
    weightUpdateFactor: z.number().min(0).default(0.1),
    minWeight: z.number().positive().default(0.5),
    maxWeight: z.number().positive().default(2.0),
    winRateWeight: z.number().min(0).max(1).default(0.7),
    scoreWeight: z.number().min(0).max(1).default(0.3),
  })
  .refine((value) => value.minWeight <= value.maxWeight, {
    message: "minWeight must not exceed maxWeight",
  });

export type PreferenceConfig = z.infer<typeof preferenceConfigSchema>;

export const cacheConfigSchema = z.object({
  analysisCacheSize: z.number().int().positive().default(500),
  askedConversationsSize: z.number().int().positive().default(10000),
  templateUsageSize: z.number().int().positive().default(1000),
  performanceCacheSize: z.number().int().positive().default(5000),
  discussionLogSize: z.number().int().positive().default(100),
  responseCacheSize: z.number().int().positive().default(500),
});

export type CacheConfig = z.infer<typeof cacheConfigSchema>;

export const inferenceConfigSchema = z.object({
  baseUrl: z.string().default("http://localhost:11434/v1"),
  apiKey: z.string().default("not-needed"),
  timeoutMs: z.number().int().positive().default(120000),
  retryAttempts: z.number().int().min(0).default(2),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(1024),
  circuitFailureThreshold: z.number().int().positive().default(3),
  circuitSuccessThreshold: z.number().int().positive().default(2),
  circuitCooldownMs: z.number().int().min(0).default(30000),
});

export type InferenceConfig = z.infer<typeof inferenceConfigSchema>;

export const appConfigSchema = z.object({
  optimization: z
    .object({
      enabled: z.boolean().default(true),
      autoSelectModel: z.boolean().default(true),
      useGroupDiscussion: z.boolean().default(false),
    })
    .default({}),
  feedback: feedbackConfigSchema.default({}),
  preference: preferenceConfigSchema.default({}),
  promptOptimization: z
    .object({
      templateSelectionStrategy: templateSelectionStrategySchema.default("best_match"),
      dynamicInstructionTuning: z.boolean().default(true),
    })
    .default({}),
  caches: cacheConfigSchema.default({}),
  export: z
    .object({
      evalRatio: z.number().min(0).max(0.9).default(0.1),
    })
    .default({}),
  system: z
    .object({
      feedbackDbPath: z.string().default("data/feedback/feedback.db"),
      rlhfExportDir: z.string().default("data/rlhf"),
    })
    .default({}),
  inference: inferenceConfigSchema.default({}),
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(5000),
    })
    .default({}),
  models: z.array(modelConfigSchema).default([]),
  groupDiscussion: groupDiscussionConfigSchema.default({}),
  templates: z.array(promptTemplateSchema).default([]),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type AppConfigInput = z.input<typeof appConfigSchema>;

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

export const feedback = sqliteTable(
  "feedback",
  {
    id: text("id").primaryKey(),
    timestamp: text("timestamp").notNull().default(""),
    conversationId: text("conversation_id").notNull().default(""),
    query: text("query").notNull().default(""),
    responses: text("responses").notNull().default(""),
    selectedResponse: text("selected_response").notNull().default(""),
    feedbackScore: real("feedback_score"),
    feedbackText: text("feedback_text"),
    metadata: text("metadata"),
  },
  (table) => ({
    conversationIdx: index("idx_feedback_conversation").on(table.conversationId),
    timestampIdx: index("idx_feedback_timestamp").on(table.timestamp),
  }),
);

export const comparisons = sqliteTable(
  "comparisons",
  {
    id: text("id").primaryKey(),
    timestamp: text("timestamp").notNull().default(""),
    conversationId: text("conversation_id").notNull().default(""),
    query: text("query").notNull().default(""),
    chosen: text("chosen").notNull().default(""),
    rejected: text("rejected").notNull().default(""),
    chosenModel: text("chosen_model").notNull().default(""),
    rejectedModel: text("rejected_model").notNull().default(""),
    metadata: text("metadata"),
  },
  (table) => ({
    conversationIdx: index("idx_comparisons_conversation").on(table.conversationId),
  }),
);

export const stats = sqliteTable(
  "stats",
  {
    id: text("id").primaryKey(),
    timestamp: text("timestamp").notNull().default(""),
    statType: text("stat_type").notNull().default(""),
    value: real("value").notNull().default(0),
    metadata: text("metadata"),
  },
  (table) => ({
    typeIdx: index("idx_stats_type").on(table.statType),
  }),
);

export const insertFeedbackDbSchema = createInsertSchema(feedback, {
  feedbackScore: z.number().min(0).max(1).nullable().optional(),
});
export const insertComparisonDbSchema = createInsertSchema(comparisons);
export const insertStatDbSchema = createInsertSchema(stats);

export type FeedbackDb = typeof feedback.$inferSelect;
export type ComparisonDb = typeof comparisons.$inferSelect;
export type StatDb = typeof stats.$inferSelect;
export type InsertFeedbackDb = z.infer<typeof insertFeedbackDbSchema>;
export type InsertComparisonDb = z.infer<typeof insertComparisonDbSchema>;
export type InsertStatDb = z.infer<typeof insertStatDbSchema>;

// ---------------------------------------------------------------------------
// Domain records
// ---------------------------------------------------------------------------

export type Metadata = Record<string, unknown>;

export interface FeedbackRecord {
  id: string;
  timestamp: string;
  conversationId: string;
  query: string;
  responses: Record<string, string>;
  selectedResponse: string;
  feedbackScore: number | null;
  feedbackText: string | null;
  metadata: Metadata;
}

export interface ComparisonRecord {
  id: string;
  timestamp: string;
  conversationId: string;
  query: string;
  chosen: string;
  rejected: string;
  chosenModel: string;
  rejectedModel: string;
  metadata: Metadata;
}

export type StoredRecord =
  | ({ type: "feedback" } & FeedbackRecord)
  | ({ type: "pairwise_comparison" } & ComparisonRecord);

export interface StatRecord {
  id: string;
  timestamp: string;
  statType: string;
  value: number;
  metadata: Metadata;
}

export interface FeedbackStats {
  totalFeedback: number;
  positiveFeedback: number;
  negativeFeedback: number;
  neutralFeedback: number;
  averageScore: number;
  modelDistribution: Record<string, number>;
  comparisonCount: number;
  dailyCounts: { date: string; count: number }[];
}

export interface TemplatePerformance {
  score: number;
  count: number;
}

export interface ModelStats {
  weight: number;
  winRate: number;
  avgScore: number;
  selectionCount: number;
  strengths: Record<Capability, number>;
}

// ---------------------------------------------------------------------------
// Inference
// ---------------------------------------------------------------------------

export interface GenerationParams {
  temperature?: number;
  maxTokens?: number;
}

export interface GenerationResult {
  response: string;
  success: boolean;
  error?: string;
  tokenCount?: number;
}

// ---------------------------------------------------------------------------
// Group discussion
// ---------------------------------------------------------------------------

export interface DiscussionRound {
  round: number;
  responses: Record<string, string>;
}

export interface DiscussionLog {
  id: string;
  query: string;
  models: string[];
  startedAt: string;
  completedAt?: string;
  rounds: DiscussionRound[];
  synthesizedBy?: string;
  response?: string;
}

export type DiscussionResult =
  | {
      success: true;
      response: string;
      discussionId: string;
      modelsUsed: string[];
      rounds: number;
      completionTime: number;
    }
  | { success: false; error: string };

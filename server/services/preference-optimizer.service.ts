import { BaseService, ManagedMap } from "../lib/base-service";
import {
  capabilityCategories,
  resolveFeedbackScore,
  type Capability,
  type FeedbackScore,
  type GroupDiscussionConfig,
  type ModelConfig,
  type ModelStats,
  type PreferenceConfig,
  type QueryProfile,
  type QueryType,
} from "@shared/schema";

const DEFAULT_STRENGTH = 0.5;
const GROUP_DEFAULT_STRENGTH = 0.7;
const DEFAULT_IMPORTANCE = 0.1;
const DECAY_WINDOW = 100;
const DECAY_OFFSET = 10;

export type CapabilityVector = Record<Capability, number>;

interface StrengthRule {
  name: string;
  applies: (profile: QueryProfile) => boolean;
  importances: Partial<CapabilityVector>;
}

/**
 * Applied in order; later rules overwrite earlier importances, so the
 * domain rules have the final say.
 */
export const REQUIRED_STRENGTH_RULES: readonly StrengthRule[] = [
  {
    name: "code",
    applies: (p) => p.requiresCode,
    importances: { programming: 0.9, algorithms: 0.7, technical_explanation: 0.6 },
  },
  {
    name: "reasoning",
    applies: (p) => p.requiresReasoning,
    importances: { reasoning: 0.8, critical_thinking: 0.7, analysis: 0.7, evaluation: 0.6 },
  },
  {
    name: "creativity",
    applies: (p) => p.requiresCreativity,
    importances: { creative: 0.9 },
  },
  {
    name: "high-complexity",
    applies: (p) => p.complexity > 7,
    importances: { comprehensive: 0.8, thorough: 0.7, balanced: 0.6 },
  },
  {
    name: "low-complexity",
    applies: (p) => p.complexity < 3,
    importances: { conciseness: 0.8, clarity: 0.7 },
  },
  { name: "how-to", applies: (p) => p.queryType === "how_to", importances: { technical_explanation: 0.7, clarity: 0.7 } },
  { name: "comparison-query", applies: (p) => p.queryType === "comparison", importances: { balanced: 0.8, analysis: 0.7 } },
  { name: "what-is", applies: (p) => p.queryType === "what_is", importances: { general_knowledge: 0.7, clarity: 0.6 } },
  { name: "opinion", applies: (p) => p.queryType === "opinion", importances: { critical_thinking: 0.8, evaluation: 0.7 } },
  { name: "list-query", applies: (p) => p.queryType === "list", importances: { comprehensive: 0.7, clarity: 0.6 } },
  {
    name: "step-by-step",
    applies: (p) => p.formatRequirements.includes("step_by_step"),
    importances: { clarity: 0.8 },
  },
  {
    name: "examples",
    applies: (p) => p.formatRequirements.includes("examples"),
    importances: { technical_explanation: 0.7 },
  },
  {
    name: "comparison-format",
    applies: (p) => p.formatRequirements.includes("comparison"),
    importances: { balanced: 0.8, analysis: 0.7 },
  },
  {
    name: "technology",
    applies: (p) => p.domain === "technology",
    importances: { technical_explanation: 0.8, programming: 0.7 },
  },
  { name: "science", applies: (p) => p.domain === "science", importances: { analysis: 0.8, reasoning: 0.7 } },
  { name: "business", applies: (p) => p.domain === "business", importances: { analysis: 0.7, balanced: 0.7 } },
  { name: "arts", applies: (p) => p.domain === "arts", importances: { creative: 0.8 } },
];

function fillVector(partial: Partial<CapabilityVector>, fallback: number): CapabilityVector {
  const pick = (category: Capability): number => partial[category] ?? fallback;
  return {
    programming: pick("programming"),
    analysis: pick("analysis"),
    creative: pick("creative"),
    reasoning: pick("reasoning"),
    math: pick("math"),
    language: pick("language"),
    technical_explanation: pick("technical_explanation"),
    evaluation: pick("evaluation"),
    critical_thinking: pick("critical_thinking"),
    problem_solving: pick("problem_solving"),
    algorithms: pick("algorithms"),
    conciseness: pick("conciseness"),
    clarity: pick("clarity"),
    summarization: pick("summarization"),
    general_knowledge: pick("general_knowledge"),
    communication: pick("communication"),
    balanced: pick("balanced"),
    comprehensive: pick("comprehensive"),
    thorough: pick("thorough"),
  };
}

function isCapability(value: string): value is Capability {
  return capabilityCategories.some((category) => category === value);
}

export function requiredStrengths(profile: QueryProfile): CapabilityVector {
  const importances: Partial<CapabilityVector> = {};
  for (const rule of REQUIRED_STRENGTH_RULES) {
    if (rule.applies(profile)) {
      Object.assign(importances, rule.importances);
    }
  }
  return fillVector(importances, DEFAULT_IMPORTANCE);
}

/**
 * Importance-weighted mean of a model's strengths over the categories that
 * matter for this query; the plain mean when none stand out.
 */
export function matchScore(strengths: CapabilityVector, required: CapabilityVector): number {
  let weighted = 0;
  let totalImportance = 0;
  for (const category of capabilityCategories) {
    const importance = required[category];
    if (importance > DEFAULT_IMPORTANCE) {
      weighted += strengths[category] * importance;
      totalImportance += importance;
    }
  }
  if (totalImportance > 0) return weighted / totalImportance;

  const values = capabilityCategories.map((category) => strengths[category]);
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

interface ModelState {
  name: string;
  role: string;
  strengths: CapabilityVector;
  weight: number;
  winRate: number;
  avgScore: number;
  selectionCount: number;
}

interface PerformanceEntry {
  score: number;
  count: number;
}

export interface PreferenceOptimizerOptions {
  models: ModelConfig[];
  groupDiscussion?: GroupDiscussionConfig;
  preference: PreferenceConfig;
  performanceCacheSize: number;
  stopWords: readonly string[];
  queryTypeOf: (query: string) => QueryType;
}

export class PreferenceOptimizerService extends BaseService {
  private readonly models: Map<string, ModelState> = new Map();
  private readonly configuredModels: string[];
  private readonly preference: PreferenceConfig;
  private readonly stopWords: Set<string>;
  private readonly queryTypeOf: (query: string) => QueryType;
  private readonly performanceCache: ManagedMap<string, Map<string, PerformanceEntry>>;

  constructor(options: PreferenceOptimizerOptions) {
    super("PreferenceOptimizerService");
    this.preference = options.preference;
    this.stopWords = new Set(options.stopWords);
    this.queryTypeOf = options.queryTypeOf;
    this.performanceCache = this.createManagedMap<string, Map<string, PerformanceEntry>>({ maxSize: options.performanceCacheSize, strategy: "lru" });

    for (const model of options.models) {
      this.models.set(model.name, this.initialState(model.name, model.role, model.strengths, DEFAULT_STRENGTH));
    }
    this.configuredModels = options.models.map((model) => model.name);

    if (options.groupDiscussion) {
      const group = options.groupDiscussion;
      this.models.set(group.name, this.initialState(group.name, "group", group.strengths, GROUP_DEFAULT_STRENGTH));
    }
  }

  /**
   * Ranks candidates by strength match times learned weight. Unknown names
   * are skipped; ties keep candidate order.
   */
  selectBestModel(profile: QueryProfile, candidates: readonly string[] = this.configuredModels): string | null {
    const required = requiredStrengths(profile);
    let best: ModelState | null = null;
    let bestScore = Number.NEGATIVE_INFINITY;

    for (const name of candidates) {
      const state = this.models.get(name);
      if (!state) {
        this.logDebug("Skipping unknown candidate model", { model: name });
        continue;
      }
      const score = matchScore(state.strengths, required) * state.weight;
      if (score > bestScore) {
        best = state;
        bestScore = score;
      }
    }

    if (!best) return null;
    best.selectionCount += 1;
    return best.name;
  }

  updateWeightsFromFeedback(
    query: string,
    responses: Record<string, string>,
    selectedModel: string,
    score: FeedbackScore,
  ): void {
    const selected = this.models.get(selectedModel);
    if (!selected) {
      this.logWarn("Feedback for unknown model ignored", { model: selectedModel });
      return;
    }

    const responding = Object.keys(responses);
    if (responding.length >= 2 && responding.includes(selectedModel)) {
      for (const name of responding) {
        const state = this.models.get(name);
        if (!state) continue;
        state.selectionCount += 1;
        const n = Math.min(DECAY_WINDOW, state.selectionCount);
        const decay = n / (n + DECAY_OFFSET);
        const outcome = name === selectedModel ? 1 : 0;
        state.winRate = clampUnit(state.winRate * decay + outcome * (1 - decay));
      }
    }

    const resolved = resolveFeedbackScore(score);
    if (resolved !== null) {
      selected.avgScore = clampUnit(selected.avgScore * 0.9 + resolved * 0.1);
      this.updatePerformanceCache(query, selectedModel, resolved);
    }

    const { winRateWeight, scoreWeight, weightUpdateFactor } = this.preference;
    const delta = (selected.winRate * winRateWeight + selected.avgScore * scoreWeight - 0.5) * weightUpdateFactor;
    selected.weight = this.clampWeight(selected.weight + delta);

    this.logDebug("Model weight updated", {
      model: selectedModel,
      weight: selected.weight,
      winRate: selected.winRate,
      avgScore: selected.avgScore,
    });
  }

  getModelWeights(): Record<string, number> {
    return Object.fromEntries(Array.from(this.models.values(), (state): [string, number] => [state.name, state.weight]));
  }

  getModelStats(): Record<string, ModelStats> {
    return Object.fromEntries(
      Array.from(this.models.values(), (state): [string, ModelStats] => [
        state.name,
        {
          weight: state.weight,
          winRate: state.winRate,
          avgScore: state.avgScore,
          selectionCount: state.selectionCount,
          strengths: { ...state.strengths },
        },
      ]),
    );
  }

  getPerformanceCache(): Record<string, Record<string, PerformanceEntry>> {
    return Object.fromEntries(
      this.performanceCache.entries().map(([key, byModel]): [string, Record<string, PerformanceEntry>] => [
        key,
        Object.fromEntries(Array.from(byModel.entries(), ([model, entry]): [string, PerformanceEntry] => [model, { ...entry }])),
      ]),
    );
  }

  hasModel(name: string): boolean {
    return this.models.has(name);
  }

  roleOf(name: string): string | undefined {
    return this.models.get(name)?.role;
  }

  resetWeights(): void {
    for (const state of this.models.values()) {
      state.weight = 1.0;
      state.winRate = 0.5;
      state.avgScore = 0.5;
      state.selectionCount = 0;
    }
  }

  clearCache(): void {
    this.performanceCache.clear();
  }

  destroy(): void {
    this.performanceCache.clear();
    this.unregister();
  }

  private initialState(
    name: string,
    role: string,
    strengths: Record<string, number>,
    fallback: number,
  ): ModelState {
    const known: Partial<CapabilityVector> = {};
    for (const [category, value] of Object.entries(strengths)) {
      if (isCapability(category)) {
        known[category] = value;
      } else {
        this.logWarn("Ignoring unknown capability", { model: name, capability: category });
      }
    }
    return {
      name,
      role,
      strengths: fillVector(known, fallback),
      weight: this.clampWeight(1.0),
      winRate: 0.5,
      avgScore: 0.5,
      selectionCount: 0,
    };
  }

  private clampWeight(weight: number): number {
    return Math.min(this.preference.maxWeight, Math.max(this.preference.minWeight, weight));
  }

  private updatePerformanceCache(query: string, model: string, score: number): void {
    const keys = [...this.extractKeywords(query), `type:${this.queryTypeOf(query)}`];
    for (const key of keys) {
      const byModel = this.performanceCache.get(key) ?? new Map<string, PerformanceEntry>();
      const entry = byModel.get(model);
      if (entry) {
        const count = entry.count + 1;
        byModel.set(model, { score: (entry.score * entry.count + score) / count, count });
      } else {
        byModel.set(model, { score, count: 1 });
      }
      this.performanceCache.set(key, byModel);
    }
  }

  private extractKeywords(query: string): string[] {
    const words = query
      .toLowerCase()
      .split(/[^\p{L}\p{N}_]+/u)
      .filter((word) => word.length > 2 && !this.stopWords.has(word));
    return Array.from(new Set(words));
  }
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

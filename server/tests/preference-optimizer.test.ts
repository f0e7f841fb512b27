import { afterEach, describe, expect, it } from "vitest";
import { capabilityCategories, preferenceConfigSchema, type QueryProfile } from "@shared/schema";
import {
  PreferenceOptimizerService,
  matchScore,
  requiredStrengths,
  type PreferenceOptimizerOptions,
} from "../services/preference-optimizer.service";
import { defaultQueryProfile, defaultQueryRules } from "../services/query-analyzer.service";

const routingProfile: QueryProfile = {
  complexity: 1.92,
  domain: "technology",
  topics: ["code"],
  queryType: "why",
  formatRequirements: ["step_by_step"],
  requiresCode: true,
  requiresReasoning: true,
  requiresCreativity: false,
  languages: ["english"],
  sentiment: "neutral",
  urgency: "normal",
};

function createOptimizer(overrides: Partial<PreferenceOptimizerOptions> = {}): PreferenceOptimizerService {
  return new PreferenceOptimizerService({
    models: [
      { name: "model-a", role: "code", systemPrompt: "", strengths: { programming: 0.9 } },
      { name: "model-b", role: "deep_thinking", systemPrompt: "", strengths: { programming: 0.3, reasoning: 0.9 } },
    ],
    preference: preferenceConfigSchema.parse({}),
    performanceCacheSize: 100,
    stopWords: defaultQueryRules.stopWords,
    queryTypeOf: () => "why",
    ...overrides,
  });
}

describe("requiredStrengths", () => {
  it("layers rule importances with later rules winning", () => {
    const required = requiredStrengths(routingProfile);

    expect(required.programming).toBe(0.7);
    expect(required.technical_explanation).toBe(0.8);
    expect(required.clarity).toBe(0.8);
    expect(required.conciseness).toBe(0.8);
    expect(required.reasoning).toBe(0.8);
    expect(required.creative).toBe(0.1);

    const relevant = capabilityCategories.filter((category) => required[category] > 0.1);
    const total = relevant.reduce((sum, category) => sum + required[category], 0);
    expect(total).toBeCloseTo(6.6, 10);
  });
});

describe("matchScore", () => {
  it("falls back to the plain mean when nothing stands out", () => {
    const required = requiredStrengths({ ...defaultQueryProfile(), complexity: 5 });
    const strengths = requiredStrengths({ ...defaultQueryProfile(), complexity: 5 });
    expect(matchScore(strengths, required)).toBeCloseTo(0.1, 10);
  });
});

describe("PreferenceOptimizerService", () => {
  let optimizer: PreferenceOptimizerService;

  afterEach(() => {
    optimizer.destroy();
  });

  it("routes the code question to the programming model", () => {
    optimizer = createOptimizer();
    const stats = optimizer.getModelStats();
    const required = requiredStrengths(routingProfile);
    const a = stats["model-a"];
    const b = stats["model-b"];
    if (!a || !b) throw new Error("models missing");

    expect(matchScore(a.strengths, required)).toBeCloseTo(3.58 / 6.6, 10);
    expect(matchScore(b.strengths, required)).toBeCloseTo(3.48 / 6.6, 10);
    expect(optimizer.selectBestModel(routingProfile)).toBe("model-a");
    expect(optimizer.getModelStats()["model-a"]?.selectionCount).toBe(1);
  });

  it("lets learned weight overturn the strength match", () => {
    optimizer = createOptimizer();
    for (let i = 0; i < 5; i++) {
      optimizer.updateWeightsFromFeedback("debug my code", { "model-a": "x", "model-b": "y" }, "model-b", {
        kind: "scalar",
        value: 1,
      });
    }
    expect(optimizer.selectBestModel(routingProfile)).toBe("model-b");
  });

  it("skips unknown candidates and returns null when none are known", () => {
    optimizer = createOptimizer();
    expect(optimizer.selectBestModel(routingProfile, ["ghost", "model-b"])).toBe("model-b");
    expect(optimizer.selectBestModel(routingProfile, ["ghost"])).toBeNull();
    expect(optimizer.selectBestModel(routingProfile, [])).toBeNull();
  });

  it("updates win rates, average score and weight after a comparison", () => {
    optimizer = createOptimizer();
    optimizer.updateWeightsFromFeedback("fix the parser", { "model-a": "a", "model-b": "b" }, "model-a", {
      kind: "scalar",
      value: 1,
    });

    const stats = optimizer.getModelStats();
    const winRateA = 10.5 / 11;
    expect(stats["model-a"]?.winRate).toBeCloseTo(winRateA, 10);
    expect(stats["model-b"]?.winRate).toBeCloseTo(0.5 / 11, 10);
    expect(stats["model-a"]?.avgScore).toBeCloseTo(0.55, 10);
    expect(stats["model-a"]?.selectionCount).toBe(1);
    expect(stats["model-a"]?.weight).toBeCloseTo(1 + (winRateA * 0.7 + 0.55 * 0.3 - 0.5) * 0.1, 10);
    expect(stats["model-b"]?.weight).toBe(1);
  });

  it("blends win rate and score with the configured weights", () => {
    optimizer = createOptimizer({
      preference: preferenceConfigSchema.parse({ winRateWeight: 0.2, scoreWeight: 0.8 }),
    });
    optimizer.updateWeightsFromFeedback("fix the parser", { "model-a": "a", "model-b": "b" }, "model-a", {
      kind: "scalar",
      value: 1,
    });

    const expected = 1 + ((10.5 / 11) * 0.2 + 0.55 * 0.8 - 0.5) * 0.1;
    expect(optimizer.getModelWeights()["model-a"]).toBeCloseTo(expected, 10);
    expect(expected).toBeCloseTo(1.01309, 5);
  });

  it("leaves win rate alone for single-response feedback and absent scores", () => {
    optimizer = createOptimizer();
    optimizer.updateWeightsFromFeedback("hello", { "model-a": "a" }, "model-a", { kind: "absent" });

    const a = optimizer.getModelStats()["model-a"];
    expect(a?.winRate).toBe(0.5);
    expect(a?.avgScore).toBe(0.5);
    // 0.5 * 0.7 + 0.5 * 0.3 - 0.5 = 0
    expect(a?.weight).toBe(1);
    expect(optimizer.getPerformanceCache()).toEqual({});
  });

  it("keeps weights inside the configured bounds", () => {
    optimizer = createOptimizer({ preference: preferenceConfigSchema.parse({ weightUpdateFactor: 5, maxWeight: 1.2 }) });
    for (let i = 0; i < 3; i++) {
      optimizer.updateWeightsFromFeedback("q", { "model-a": "a", "model-b": "b" }, "model-a", { kind: "scalar", value: 1 });
      optimizer.updateWeightsFromFeedback("q", { "model-a": "a", "model-b": "b" }, "model-b", { kind: "scalar", value: 0 });
    }
    const weights = optimizer.getModelWeights();
    expect(weights["model-a"]).toBe(1.2);
    expect(weights["model-b"]).toBeGreaterThanOrEqual(0.5);
    expect(weights["model-b"]).toBeLessThanOrEqual(1.2);
  });

  it("ignores feedback for unknown models", () => {
    optimizer = createOptimizer();
    optimizer.updateWeightsFromFeedback("q", { ghost: "g", "model-a": "a" }, "ghost", { kind: "scalar", value: 1 });
    expect(optimizer.getModelWeights()).toEqual({ "model-a": 1, "model-b": 1 });
  });

  it("records per-keyword performance without stop words", () => {
    optimizer = createOptimizer();
    optimizer.updateWeightsFromFeedback("How does the parser work", { "model-a": "a" }, "model-a", {
      kind: "range",
      low: 0.6,
      high: 0.8,
    });

    const cache = optimizer.getPerformanceCache();
    expect(Object.keys(cache).sort()).toEqual(["parser", "type:why", "work"]);
    expect(cache.parser?.["model-a"]?.count).toBe(1);
    expect(cache.parser?.["model-a"]?.score).toBeCloseTo(0.7, 10);
  });

  it("registers the group discussion pseudo-model with its own defaults", () => {
    optimizer = createOptimizer({
      groupDiscussion: {
        name: "group_discussion",
        systemPrompt: "",
        strengths: { comprehensive: 0.9 },
        defaultRounds: 2,
      },
    });
    expect(optimizer.hasModel("group_discussion")).toBe(true);
    expect(optimizer.roleOf("group_discussion")).toBe("group");
    expect(optimizer.getModelStats()["group_discussion"]?.strengths.programming).toBe(0.7);
    // only configured models are default candidates
    expect(optimizer.selectBestModel(routingProfile)).toBe("model-a");
  });

  it("resets learned state", () => {
    optimizer = createOptimizer();
    optimizer.updateWeightsFromFeedback("q", { "model-a": "a", "model-b": "b" }, "model-a", { kind: "scalar", value: 1 });
    optimizer.resetWeights();
    expect(optimizer.getModelStats()["model-a"]).toMatchObject({ weight: 1, winRate: 0.5, avgScore: 0.5, selectionCount: 0 });
  });
});

import { existsSync, readdirSync } from "fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IN_MEMORY_PATH } from "../db";
import { FeedbackStorage } from "../feedback-storage";
import { OptimizationManagerService } from "../services/optimization-manager.service";
import { FakeProvider, makeTempDir, sequence, testConfig } from "./helpers";

const routingQuery = "Why does memory leak in this code? Please explain step by step";

describe("OptimizationManagerService", () => {
  let store: FeedbackStorage;
  let manager: OptimizationManagerService;
  let tmp: ReturnType<typeof makeTempDir>;

  beforeEach(() => {
    tmp = makeTempDir();
    store = new FeedbackStorage({ dbPath: IN_MEMORY_PATH });
  });

  afterEach(() => {
    manager.destroy();
    store.destroy();
    tmp.cleanup();
  });

  function create(
    overrides: Parameters<typeof testConfig>[0] = {},
    provider = new FakeProvider({ "model-a": "answer a", "model-b": "answer b" }),
  ): OptimizationManagerService {
    const config = testConfig({ system: { rlhfExportDir: tmp.dir }, ...overrides });
    return new OptimizationManagerService({ config, store, provider, random: sequence(0.1) });
  }

  it("analyzes the query and composes the prompt", () => {
    manager = create();
    const result = manager.optimizeQuery(routingQuery);

    expect(result.templateUsed).toBe("default");
    expect(result.analysis?.domain).toBe("technology");
    expect(result.optimizedPrompt).toBe(
      `${routingQuery}\n\nKeep the answer concise and easy to follow. Provide clean, commented code. Explain the reasoning behind each conclusion.`,
    );
    expect(manager.templates.templateUsedFor(routingQuery)).toBe("default");
  });

  it("routes through the analyzer and preference optimizer", () => {
    manager = create();
    expect(manager.selectBestModel(routingQuery)).toBe("model-a");
    expect(manager.selectBestModel(routingQuery, undefined, ["model-b"])).toBe("model-b");
  });

  it("returns neutral values while disabled", async () => {
    const provider = new FakeProvider({ "model-a": "answer a", "model-b": "answer b" });
    manager = create({ optimization: { enabled: false } }, provider);

    expect(manager.optimizeQuery("hello")).toEqual({ analysis: null, optimizedPrompt: "hello", templateUsed: "default" });
    expect(manager.selectBestModel("hello")).toBeNull();
    expect(manager.shouldRequestFeedback("conv")).toBe(false);
    expect(
      manager.processFeedback({
        conversationId: "conv",
        query: "hello",
        responses: { "model-a": "hi" },
        selectedResponse: "model-a",
        score: { kind: "scalar", value: 1 },
      }),
    ).toBe(false);
    expect(store.getTotalCount()).toBe(0);
    expect(manager.exportFeedbackData()).toBe("");
    expect(readdirSync(tmp.dir)).toEqual([]);
    expect(await manager.conductDiscussion("q", { models: ["model-a", "model-b"], rounds: 2 })).toEqual({
      success: false,
      error: "Optimization disabled",
    });
    expect(provider.calls).toHaveLength(0);

    manager.toggleOptimization(true);
    expect(manager.selectBestModel("hello")).not.toBeNull();
  });

  it("stores feedback, moves weights and credits the template", () => {
    manager = create();
    manager.optimizeQuery(routingQuery);

    const ok = manager.processFeedback({
      conversationId: "conv-1",
      query: routingQuery,
      responses: { "model-a": "answer a", "model-b": "answer b" },
      selectedResponse: "model-b",
      score: { kind: "scalar", value: 1 },
    });

    expect(ok).toBe(true);
    expect(store.getTotalCount()).toBe(1);
    expect(manager.preferences.getModelWeights()["model-b"]).toBeGreaterThan(1);
    expect(manager.templates.getPerformance()).toEqual({ default: { score: 1, count: 1 } });

    const stats = store.getStats("feedback_score");
    expect(stats).toHaveLength(1);
    expect(stats[0]?.value).toBe(1);
    expect(stats[0]?.metadata).toEqual({ model: "model-b", template: "default" });
  });

  it("leaves weights alone when the feedback is not stored", () => {
    manager = create();
    manager.toggleFeedbackCollection(false);

    const ok = manager.processFeedback({
      conversationId: "conv-1",
      query: "q",
      responses: { "model-a": "a", "model-b": "b" },
      selectedResponse: "model-a",
      score: { kind: "scalar", value: 1 },
    });

    expect(ok).toBe(false);
    expect(manager.preferences.getModelWeights()["model-a"]).toBe(1);
    expect(manager.templates.getPerformance()).toEqual({});
  });

  it("skips template credit and stats for an absent score", () => {
    manager = create();
    manager.processFeedback({
      conversationId: "conv-1",
      query: "q",
      responses: { "model-a": "a" },
      selectedResponse: "model-a",
      score: { kind: "absent" },
    });

    expect(store.getTotalCount()).toBe(1);
    expect(manager.templates.getPerformance()).toEqual({});
    expect(store.getStats("feedback_score")).toEqual([]);
  });

  it("buckets stored samples into positive, negative and neutral", () => {
    manager = create();
    for (const [i, value] of [0.9, 0.5, 0.1].entries()) {
      manager.processFeedback({
        conversationId: `conv-${i}`,
        query: "q",
        responses: { "model-a": "a" },
        selectedResponse: "model-a",
        score: { kind: "scalar", value },
      });
    }

    const stats = manager.getStats();
    expect(stats.enabled).toBe(true);
    expect(stats.feedbackCollection).toEqual({
      enabled: true,
      totalSamples: 3,
      positiveSamples: 1,
      negativeSamples: 1,
      neutralSamples: 1,
    });
    expect(Object.keys(stats.modelPreferences).sort()).toEqual(["group_discussion", "model-a", "model-b"]);
    expect(stats.cacheSizes.cachedFeedback).toBe(3);
  });

  it("asks for feedback through the collector", () => {
    manager = create();
    expect(manager.shouldRequestFeedback("conv-1")).toBe(true);
    expect(manager.shouldRequestFeedback("conv-1")).toBe(false);
  });

  it("exports into the configured directory", () => {
    manager = create();
    manager.processFeedback({
      conversationId: "conv-1",
      query: "q",
      responses: { "model-a": "a" },
      selectedResponse: "model-a",
      score: { kind: "scalar", value: 0.7 },
    });

    const path = manager.exportFeedbackData();
    expect(path.startsWith(tmp.dir)).toBe(true);
    expect(existsSync(path)).toBe(true);
  });

  it("runs group discussions through the orchestrator", async () => {
    manager = create();
    const result = await manager.conductDiscussion("q", { models: ["model-a"], rounds: 1 });
    expect(result.success).toBe(true);
  });

  it("clears its caches", () => {
    manager = create();
    manager.optimizeQuery("hello there");
    expect(manager.getStats().cacheSizes.analysis).toBe(1);

    manager.clearCaches();
    expect(manager.getStats().cacheSizes.analysis).toBe(0);
    expect(manager.templates.templateUsedFor("hello there")).toBeUndefined();
  });
});

import { createServer, type Server } from "http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { createApp } from "../app";
import { IN_MEMORY_PATH } from "../db";
import { FeedbackStorage } from "../feedback-storage";
import { AssistantService } from "../services/assistant.service";
import { OptimizationManagerService } from "../services/optimization-manager.service";
import { FakeProvider, makeTempDir, sequence, testConfig } from "./helpers";

describe("HTTP API", () => {
  let server: Server;
  let baseUrl: string;
  let store: FeedbackStorage;
  let manager: OptimizationManagerService;
  let assistant: AssistantService;
  let tmp: ReturnType<typeof makeTempDir>;

  beforeEach(async () => {
    tmp = makeTempDir();
    store = new FeedbackStorage({ dbPath: IN_MEMORY_PATH });
    const provider = new FakeProvider({ "model-a": "answer a", "model-b": "answer b" });
    manager = new OptimizationManagerService({
      config: testConfig({ system: { rlhfExportDir: tmp.dir } }),
      store,
      provider,
      random: sequence(0.9),
    });
    assistant = new AssistantService({
      manager,
      provider,
      autoSelectModel: true,
      useGroupDiscussion: false,
      responseCacheSize: 10,
    });

    server = createServer(createApp({ manager, assistant, provider, store }));
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    assistant.destroy();
    manager.destroy();
    store.destroy();
    tmp.cleanup();
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "healthy",
      optimization: true,
      feedbackSamples: 0,
      models: ["model-a", "model-b"],
    });
  });

  it("analyzes and routes a query", async () => {
    const analyzed = await post("/api/optimization/analyze", { query: "Why does memory leak in this code?" });
    expect(analyzed.status).toBe(200);
    expect(await analyzed.json()).toMatchObject({ templateUsed: "default", analysis: { queryType: "why" } });

    const routed = await post("/api/optimization/select-model", {
      query: "Why does memory leak in this code? Please explain step by step",
    });
    expect(await routed.json()).toEqual({ model: "model-a" });
  });

  it("rejects invalid bodies with the failing fields", async () => {
    const res = await post("/api/optimization/analyze", { query: "" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Validation failed",
      details: [{ path: "query", message: "Query is required" }],
    });
  });

  it("records feedback with a range score", async () => {
    const res = await post("/api/optimization/feedback", {
      conversationId: "conv-1",
      query: "q",
      responses: { "model-a": "a", "model-b": "b" },
      selectedResponse: "model-a",
      score: { low: 0.6, high: 0.8 },
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ success: true });
    expect(store.getCountByScore(0.69, 0.71)).toBe(1);

    const stats = await fetch(`${baseUrl}/api/optimization/stats`);
    expect(await stats.json()).toMatchObject({ feedbackCollection: { totalSamples: 1, positiveSamples: 1 } });
  });

  it("decides whether to ask for feedback", async () => {
    const res = await fetch(`${baseUrl}/api/optimization/feedback/should-request/conv-1`);
    expect(await res.json()).toEqual({ shouldRequest: false });
  });

  it("toggles optimization and collection", async () => {
    const res = await post("/api/optimization/toggle", { optimization: false });
    expect(await res.json()).toEqual({ optimization: false, feedbackCollection: true, templateStrategy: "best_match" });
    expect(manager.isEnabled).toBe(false);

    const strategy = await post("/api/optimization/toggle", { templateStrategy: "performance_based" });
    expect(await strategy.json()).toMatchObject({ templateStrategy: "performance_based" });
    expect(manager.templates.currentStrategy).toBe("performance_based");

    const empty = await post("/api/optimization/toggle", {});
    expect(empty.status).toBe(400);
  });

  it("lists templates with the active strategy", async () => {
    const res = await fetch(`${baseUrl}/api/optimization/templates`);
    expect(await res.json()).toEqual({ strategy: "best_match", templates: [] });
  });

  it("exports stored feedback", async () => {
    await post("/api/optimization/feedback", {
      conversationId: "conv-1",
      query: "q",
      responses: { "model-a": "a" },
      selectedResponse: "model-a",
      score: 0.9,
    });

    const res = await post("/api/optimization/export", { format: "jsonl" });
    expect(res.status).toBe(200);
    const body = z.object({ path: z.string() }).parse(await res.json());
    expect(body.path.startsWith(tmp.dir)).toBe(true);
  });

  it("runs and lists discussions", async () => {
    const created = await post("/api/discussions", { query: "Plan a migration", models: ["model-a"], rounds: 1 });
    expect(created.status).toBe(200);
    const result = z.object({ success: z.literal(true), discussionId: z.string() }).parse(await created.json());

    const list = await fetch(`${baseUrl}/api/discussions`);
    expect(await list.json()).toMatchObject({ discussions: [{ id: result.discussionId, rounds: 1 }] });

    const one = await fetch(`${baseUrl}/api/discussions/${result.discussionId}`);
    expect(await one.json()).toMatchObject({ id: result.discussionId, query: "Plan a migration" });

    const missing = await fetch(`${baseUrl}/api/discussions/nope`);
    expect(missing.status).toBe(404);
  });

  it("answers and accepts feedback through the assistant", async () => {
    const answered = await post("/api/assistant/respond", { query: "Sort a list", conversationId: "conv-9" });
    expect(answered.status).toBe(200);
    expect(await answered.json()).toMatchObject({ success: true, conversationId: "conv-9" });

    const accepted = await post("/api/assistant/feedback", {
      conversationId: "conv-9",
      query: "Sort a list",
      selectedResponse: "model-a",
      score: 1,
    });
    expect(accepted.status).toBe(201);

    const unknown = await post("/api/assistant/feedback", {
      conversationId: "conv-0",
      query: "Sort a list",
      selectedResponse: "model-a",
      score: 1,
    });
    expect(unknown.status).toBe(404);
  });

  it("changes assistant settings and clears cached answers", async () => {
    const initial = await fetch(`${baseUrl}/api/assistant/settings`);
    expect(await initial.json()).toEqual({ autoSelectModel: true, useGroupDiscussion: false });

    const updated = await post("/api/assistant/settings", { useGroupDiscussion: true });
    expect(await updated.json()).toEqual({ autoSelectModel: true, useGroupDiscussion: true });

    const empty = await post("/api/assistant/settings", {});
    expect(empty.status).toBe(400);

    await post("/api/assistant/respond", { query: "Sort a list", conversationId: "conv-c" });
    expect(assistant.cachedResponses("conv-c", "Sort a list")).toBeDefined();

    const cleared = await fetch(`${baseUrl}/api/assistant/responses`, { method: "DELETE" });
    expect(cleared.status).toBe(204);
    expect(assistant.cachedResponses("conv-c", "Sort a list")).toBeUndefined();
  });

  it("answers unknown API paths and malformed JSON with errors", async () => {
    const missing = await fetch(`${baseUrl}/api/nothing-here`);
    expect(missing.status).toBe(404);

    const malformed = await fetch(`${baseUrl}/api/optimization/analyze`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });
    expect(malformed.status).toBe(400);
  });
});

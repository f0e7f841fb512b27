import { writeFileSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { defaultConfig, loadConfig } from "../config";
import { makeTempDir } from "./helpers";

const repoConfigDir = fileURLToPath(new URL("../../config", import.meta.url));

describe("loadConfig", () => {
  let tmp: ReturnType<typeof makeTempDir>;

  beforeEach(() => {
    tmp = makeTempDir();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it("loads the shipped configuration", () => {
    const config = loadConfig({ configDir: repoConfigDir, env: {} });

    expect(config.models.map((model) => model.name)).toEqual(["qwen2.5-coder:7b", "deepseek-r1:8b", "deepseek-r1:1.5b"]);
    expect(config.templates.map((template) => template.name)).toEqual(["general", "programming", "step_by_step", "creative"]);
    expect(config.feedback.collectionProbability).toBe(0.3);
    expect(config.preference).toMatchObject({ winRateWeight: 0.7, scoreWeight: 0.3 });
    expect(config.groupDiscussion.name).toBe("group_discussion");
  });

  it("applies environment overrides", () => {
    const config = loadConfig({
      configDir: repoConfigDir,
      env: {
        FEEDBACK_DB_PATH: "/tmp/other.db",
        RLHF_EXPORT_DIR: "/tmp/exports",
        LLM_BASE_URL: "http://127.0.0.1:9999/v1",
        LLM_API_KEY: "test-secret",
        LLM_TIMEOUT_MS: "5000",
        LLM_RETRY_ATTEMPTS: "0",
        PORT: "8080",
      },
    });

    expect(config.system).toEqual({ feedbackDbPath: "/tmp/other.db", rlhfExportDir: "/tmp/exports" });
    expect(config.inference).toMatchObject({
      baseUrl: "http://127.0.0.1:9999/v1",
      apiKey: "test-secret",
      timeoutMs: 5000,
      retryAttempts: 0,
    });
    expect(config.server.port).toBe(8080);
  });

  it("ignores overrides that do not parse", () => {
    const config = loadConfig({ configDir: repoConfigDir, env: { PORT: "eighty", LLM_TIMEOUT_MS: "-1" } });
    expect(config.server.port).toBe(5000);
    expect(config.inference.timeoutMs).toBe(120000);
  });

  it("falls back to defaults for missing files", () => {
    const config = loadConfig({ configDir: tmp.dir, env: {} });
    expect(config).toEqual(defaultConfig());
  });

  it("falls back per file when one is invalid", () => {
    writeFileSync(join(tmp.dir, "default.json"), JSON.stringify({ feedback: { collectionProbability: 2 } }));
    writeFileSync(join(tmp.dir, "models.json"), "{ not json");
    writeFileSync(
      join(tmp.dir, "prompt-templates.json"),
      JSON.stringify({ templates: [{ name: "plain", template: "{query}" }] }),
    );

    const config = loadConfig({ configDir: tmp.dir, env: {} });
    expect(config.feedback.collectionProbability).toBe(0.3);
    expect(config.models).toEqual([]);
    expect(config.templates).toEqual([
      {
        name: "plain",
        domains: ["general"],
        complexity: "medium",
        useCases: [],
        template: "{query}",
      },
    ]);
  });
});

import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { appConfigSchema, type AppConfig, type AppConfigInput, type GenerationParams, type GenerationResult } from "@shared/schema";
import type { InferenceProvider } from "../llm-client";

export interface ProviderCall {
  model: string;
  prompt: string;
  systemPrompt?: string;
  params?: GenerationParams;
}

type Reply = (call: ProviderCall) => GenerationResult;

/** Answers from a per-model script; unknown models fail like the real provider. */
export class FakeProvider implements InferenceProvider {
  readonly calls: ProviderCall[] = [];
  private readonly replies: Map<string, Reply>;

  constructor(replies: Record<string, Reply | string>) {
    this.replies = new Map(
      Object.entries(replies).map(([model, reply]): [string, Reply] => [
        model,
        typeof reply === "string" ? () => ({ response: reply, success: true }) : reply,
      ]),
    );
  }

  async generate(model: string, prompt: string, systemPrompt?: string, params?: GenerationParams): Promise<GenerationResult> {
    const call = { model, prompt, systemPrompt, params };
    this.calls.push(call);
    const reply = this.replies.get(model);
    if (!reply) return { response: "", success: false, error: `Model '${model}' is not configured` };
    return reply(call);
  }

  listModels(): string[] {
    return Array.from(this.replies.keys());
  }

  callsFor(model: string): ProviderCall[] {
    return this.calls.filter((call) => call.model === model);
  }
}

export const failing: Reply = () => ({ response: "", success: false, error: "connection refused" });

export function makeTempDir(prefix = "pref-router-"): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export function testConfig(overrides: AppConfigInput = {}): AppConfig {
  return appConfigSchema.parse({
    models: [
      { name: "model-a", role: "code", systemPrompt: "You write code.", strengths: { programming: 0.9 } },
      { name: "model-b", role: "deep_thinking", systemPrompt: "You reason carefully.", strengths: { programming: 0.3, reasoning: 0.9 } },
    ],
    ...overrides,
  });
}

/** Deterministic stand-in for Math.random cycling through `values`. */
export function sequence(...values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index += 1;
    return value;
  };
}

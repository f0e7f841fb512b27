import { v4 as uuidv4 } from "uuid";
import { BaseService, ManagedMap } from "../lib/base-service";
import { describeError } from "../lib/errors";
import type { InferenceProvider } from "../llm-client";
import type {
  DiscussionLog,
  DiscussionResult,
  DiscussionRound,
  GenerationParams,
  GroupDiscussionConfig,
  ModelConfig,
} from "@shared/schema";

const SYNTHESIZER_ROLE = "deep_thinking";
const DEFAULT_PARAMS: Required<GenerationParams> = { temperature: 0.7, maxTokens: 1024 };
const SYNTHESIS_PARAMS: Required<GenerationParams> = { temperature: 0.5, maxTokens: 1536 };

export interface DiscussionOptions {
  discussionId?: string;
  models?: string[];
  rounds?: number;
  params?: GenerationParams;
}

export interface GroupDiscussionOptions {
  provider: InferenceProvider;
  models: ModelConfig[];
  config: GroupDiscussionConfig;
  logSize: number;
  random?: () => number;
}

export class GroupDiscussionService extends BaseService {
  private readonly provider: InferenceProvider;
  private readonly models: Map<string, ModelConfig>;
  private readonly config: GroupDiscussionConfig;
  private readonly random: () => number;
  private readonly discussions: ManagedMap<string, DiscussionLog>;

  constructor(options: GroupDiscussionOptions) {
    super("GroupDiscussionService");
    this.provider = options.provider;
    this.models = new Map(options.models.map((model) => [model.name, model]));
    this.config = options.config;
    this.random = options.random ?? Math.random;
    this.discussions = this.createManagedMap<string, DiscussionLog>({ maxSize: options.logSize, strategy: "fifo" });
  }

  get name(): string {
    return this.config.name;
  }

  /**
   * Runs the rounds sequentially: every participant answers, their answers
   * seed the next round, and one model condenses the last round.
   */
  async conductDiscussion(query: string, options: DiscussionOptions = {}): Promise<DiscussionResult> {
    const startTime = Date.now();
    const requested = options.models ?? Array.from(this.models.keys());
    const participants = requested.filter((name) => this.models.has(name));

    if (participants.length === 0) {
      this.logWarn("No participating models for discussion", { requested });
      return { success: false, error: "No models available for group discussion" };
    }

    const discussionId = options.discussionId ?? `disc_${uuidv4()}`;
    const rounds = Math.max(1, options.rounds ?? this.config.defaultRounds);
    const params = { ...DEFAULT_PARAMS, ...options.params };

    const log: DiscussionLog = {
      id: discussionId,
      query,
      models: participants,
      startedAt: new Date(startTime).toISOString(),
      rounds: [],
    };
    this.discussions.set(discussionId, log);
    this.log("Starting group discussion", { discussionId, models: participants, rounds });

    let context = query;
    for (let roundIndex = 0; roundIndex < rounds; roundIndex++) {
      const responses: Record<string, string> = {};

      for (const model of participants) {
        const result = await this.callModel(model, context, this.expertSystemPrompt(model, roundIndex), params);
        if (result !== null) {
          responses[model] = result;
        }
      }

      const round: DiscussionRound = { round: roundIndex + 1, responses };
      log.rounds.push(round);

      if (roundIndex < rounds - 1) {
        context = this.nextRoundContext(query, responses, roundIndex);
      }
    }

    const { response, synthesizedBy } = await this.synthesize(query, log, participants);
    log.response = response;
    log.synthesizedBy = synthesizedBy;
    log.completedAt = new Date().toISOString();

    return {
      success: true,
      response,
      discussionId,
      modelsUsed: participants,
      rounds,
      completionTime: (Date.now() - startTime) / 1000,
    };
  }

  getDiscussion(discussionId: string): DiscussionLog | undefined {
    return this.discussions.get(discussionId);
  }

  listDiscussions(): DiscussionLog[] {
    return this.discussions.values();
  }

  clearDiscussions(): void {
    this.discussions.clear();
  }

  /** Deep-thinking model if one is configured, else a random participant. */
  selectSynthesisModel(participants: readonly string[]): string | null {
    for (const model of this.models.values()) {
      if (model.role === SYNTHESIZER_ROLE) return model.name;
    }
    if (participants.length > 0) {
      return participants[Math.floor(this.random() * participants.length)] ?? participants[0];
    }
    const first = this.models.keys().next();
    return first.done ? null : first.value;
  }

  destroy(): void {
    this.discussions.clear();
    this.unregister();
  }

  private roleOf(model: string): string {
    return this.models.get(model)?.role ?? "assistant";
  }

  private async callModel(
    model: string,
    prompt: string,
    systemPrompt: string,
    params: GenerationParams,
  ): Promise<string | null> {
    try {
      const result = await this.provider.generate(model, prompt, systemPrompt, params);
      if (!result.success) {
        this.logWarn("Model failed during discussion round", { model, error: result.error });
        return null;
      }
      return result.response;
    } catch (error) {
      this.logError("Model threw during discussion round", { model, error: describeError(error) });
      return null;
    }
  }

  private expertSystemPrompt(model: string, roundIndex: number): string {
    const role = this.roleOf(model);
    const base = this.models.get(model)?.systemPrompt ?? "";
    const intro = `You are taking part in a panel discussion as the ${role} expert.`;
    const task =
      roundIndex === 0
        ? `Answer the question from your ${role} expertise, leaning on what you do best.`
        : `Read the other experts' opinions, then add what your ${role} perspective contributes and correct anything you disagree with.`;
    return base ? `${base}\n\n${intro} ${task}` : `${intro} ${task}`;
  }

  private nextRoundContext(query: string, responses: Record<string, string>, roundIndex: number): string {
    const parts = [`Original question: ${query}`, `\nRound ${roundIndex + 1} is complete. The experts said:`];
    for (const [model, response] of Object.entries(responses)) {
      parts.push(`\n--- ${this.roleOf(model)} expert ---`);
      parts.push(response);
    }
    parts.push(`\n\nRound ${roundIndex + 2}: build on these opinions and improve the answer.`);
    return parts.join("\n");
  }

  private async synthesize(
    query: string,
    log: DiscussionLog,
    participants: readonly string[],
  ): Promise<{ response: string; synthesizedBy?: string }> {
    const lastRound = log.rounds[log.rounds.length - 1];
    if (!lastRound) {
      return { response: "Not enough discussion to synthesize an answer." };
    }

    const finalResponses = Object.entries(lastRound.responses);
    if (finalResponses.length === 0) {
      return { response: "No responses in the final discussion round." };
    }

    const prompt = [`Question: ${query}`, "\nThe experts gave these final opinions:"];
    for (const [model, response] of finalResponses) {
      prompt.push(`\n--- ${this.roleOf(model)} expert ---`);
      prompt.push(response);
    }
    prompt.push("\nCombine these opinions into one complete, balanced answer.");

    const synthesizer = this.selectSynthesisModel(participants);
    if (synthesizer !== null) {
      const synthesized = await this.callModel(synthesizer, prompt.join("\n"), this.config.systemPrompt, SYNTHESIS_PARAMS);
      if (synthesized !== null) {
        return { response: synthesized, synthesizedBy: synthesizer };
      }
    }

    this.logWarn("Synthesis failed, concatenating final opinions", { discussionId: log.id, synthesizer });
    return {
      response: finalResponses
        .map(([model, response]) => `From ${this.roleOf(model)} perspective:\n${response}`)
        .join("\n\n"),
    };
  }
}

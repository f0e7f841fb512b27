import { BaseService, ManagedMap } from "../lib/base-service";
import type {
  FormatRequirement,
  PromptTemplate,
  QueryProfile,
  TemplateComplexity,
  TemplatePerformance,
  TemplateSelectionStrategy,
} from "@shared/schema";

export const DEFAULT_TEMPLATE: PromptTemplate = {
  name: "default",
  description: "Identity template",
  domains: ["general"],
  complexity: "medium",
  useCases: ["general"],
  template: "{query}",
};

const DEFAULT_TEMPLATE_SCORE = 0.5;

const FORMAT_INSTRUCTIONS: Record<FormatRequirement, string> = {
  list: "Present the results as a structured list.",
  step_by_step: "Give detailed step-by-step instructions.",
  examples: "Include concrete examples.",
  summary: "Include a short summary of the key points.",
  comparison: "Compare the different aspects explicitly.",
  pros_cons: "List the pros and cons.",
  table: "Present data in a table where it fits.",
  diagram: "Describe the idea with a diagram or chart where possible.",
};

export interface TemplateSelectorOptions {
  templates: PromptTemplate[];
  strategy: TemplateSelectionStrategy;
  dynamicInstructionTuning: boolean;
  usageCacheSize: number;
}

export function complexityTier(complexity: number): TemplateComplexity {
  if (complexity < 3) return "low";
  if (complexity > 7) return "high";
  return "medium";
}

export function formatRequirementsToInstructions(requirements: readonly FormatRequirement[]): string {
  return requirements.map((requirement) => FORMAT_INSTRUCTIONS[requirement]).join(" ");
}

export class TemplateSelectorService extends BaseService {
  private readonly templates: PromptTemplate[];
  private strategy: TemplateSelectionStrategy;
  private readonly dynamicInstructionTuning: boolean;
  private readonly performance: Map<string, TemplatePerformance> = new Map();
  private readonly usageByQuery: ManagedMap<string, string>;

  constructor(options: TemplateSelectorOptions) {
    super("TemplateSelectorService");
    this.templates = [...options.templates];
    this.strategy = options.strategy;
    this.dynamicInstructionTuning = options.dynamicInstructionTuning;
    this.usageByQuery = this.createManagedMap<string, string>({ maxSize: options.usageCacheSize, strategy: "lru" });
  }

  get currentStrategy(): TemplateSelectionStrategy {
    return this.strategy;
  }

  select(profile: QueryProfile): PromptTemplate {
    if (this.templates.length === 0) return DEFAULT_TEMPLATE;
    return this.strategy === "performance_based" ? this.selectByPerformance(profile) : this.selectBestMatch(profile);
  }

  scoreTemplate(template: PromptTemplate, profile: QueryProfile): number {
    let score = 0;

    if (template.domains.includes(profile.domain)) {
      score += 3;
    } else if (template.domains.includes("general")) {
      score += 1;
    }

    for (const useCase of template.useCases) {
      if (useCase === profile.queryType) score += 2;
      if (useCase === "code" && profile.requiresCode) score += 2;
      if (useCase === "reasoning" && profile.requiresReasoning) score += 2;
      if (useCase === "creative" && profile.requiresCreativity) score += 2;
    }

    if (template.complexity === complexityTier(profile.complexity)) {
      score += 2;
    }

    return score;
  }

  compose(query: string, profile: QueryProfile, template: PromptTemplate): string {
    const replacements: Record<string, string> = {
      "{query}": query,
      "{domain}": profile.domain,
      "{complexity}": String(profile.complexity),
      "{query_type}": profile.queryType,
      "{topics}": profile.topics.join(", "),
      "{requires_code}": String(profile.requiresCode),
      "{requires_reasoning}": String(profile.requiresReasoning),
      "{requires_creativity}": String(profile.requiresCreativity),
      "{format_requirements}": formatRequirementsToInstructions(profile.formatRequirements),
      "{sentiment}": profile.sentiment,
      "{urgency}": profile.urgency,
      "{languages}": profile.languages.join(", "),
    };

    // one pass, so a substituted query containing "{domain}" is left alone
    let prompt = template.template.replace(/\{[a-z_]+\}/g, (token) => replacements[token] ?? token);

    if (this.dynamicInstructionTuning) {
      const instructions = this.additionalInstructions(profile);
      if (instructions) {
        prompt += `\n\n${instructions}`;
      }
    }

    return prompt;
  }

  updatePerformance(templateName: string, score: number): void {
    const current = this.performance.get(templateName);
    if (!current) {
      this.performance.set(templateName, { score, count: 1 });
      return;
    }
    const count = current.count + 1;
    this.performance.set(templateName, {
      score: (current.score * current.count + score) / count,
      count,
    });
  }

  recordUsage(query: string, templateName: string): void {
    this.usageByQuery.set(query, templateName);
  }

  templateUsedFor(query: string): string | undefined {
    return this.usageByQuery.get(query);
  }

  getPerformance(): Record<string, TemplatePerformance> {
    return Object.fromEntries(
      Array.from(this.performance.entries(), ([name, perf]): [string, TemplatePerformance] => [name, { ...perf }]),
    );
  }

  getTemplates(): PromptTemplate[] {
    return [...this.templates];
  }

  setStrategy(strategy: TemplateSelectionStrategy): void {
    this.strategy = strategy;
  }

  clearUsage(): void {
    this.usageByQuery.clear();
  }

  destroy(): void {
    this.usageByQuery.clear();
    this.unregister();
  }

  private selectBestMatch(profile: QueryProfile): PromptTemplate {
    let best = this.templates[0];
    let bestScore = this.scoreTemplate(best, profile);
    for (const template of this.templates.slice(1)) {
      const score = this.scoreTemplate(template, profile);
      if (score > bestScore) {
        best = template;
        bestScore = score;
      }
    }
    return best;
  }

  private selectByPerformance(profile: QueryProfile): PromptTemplate {
    const matching = this.templates.filter(
      (template) => template.domains.includes(profile.domain) || template.domains.includes("general"),
    );
    const pool = matching.length > 0 ? matching : this.templates;

    let best = pool[0];
    let bestScore = this.performance.get(best.name)?.score ?? DEFAULT_TEMPLATE_SCORE;
    for (const template of pool.slice(1)) {
      const score = this.performance.get(template.name)?.score ?? DEFAULT_TEMPLATE_SCORE;
      if (score > bestScore) {
        best = template;
        bestScore = score;
      }
    }
    return best;
  }

  private additionalInstructions(profile: QueryProfile): string {
    const instructions: string[] = [];

    if (profile.complexity > 7) {
      instructions.push("Analyze the problem thoroughly, covering several angles in depth.");
    } else if (profile.complexity < 3) {
      instructions.push("Keep the answer concise and easy to follow.");
    }

    if (profile.requiresCode) {
      instructions.push("Provide clean, commented code.");
    }
    if (profile.requiresReasoning) {
      instructions.push("Explain the reasoning behind each conclusion.");
    }
    if (profile.requiresCreativity) {
      instructions.push("Be original and inventive.");
    }
    if (profile.languages.includes("chinese")) {
      instructions.push("Respond in Chinese, using natural phrasing and appropriate terminology.");
    }
    if (profile.urgency === "high") {
      instructions.push("Lead with the essential information and the quickest workable solution.");
    }

    return instructions.join(" ");
  }
}

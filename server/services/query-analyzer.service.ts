import { BaseService, ManagedMap } from "../lib/base-service";
import {
  queryRulesSchema,
  type Domain,
  type FormatRequirement,
  type Language,
  type QueryProfile,
  type QueryRules,
  type QueryType,
} from "@shared/schema";
import rawQueryRules from "../data/query-rules.json";

export const defaultQueryRules: QueryRules = queryRulesSchema.parse(rawQueryRules);

export interface QueryAnalyzerOptions {
  cacheSize: number;
  rules?: QueryRules;
}

const CJK_PATTERN = /[\u4e00-\u9fff]/;
const LATIN_PATTERN = /[A-Za-z]/;

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

function countHits(text: string, keywords: readonly string[]): number {
  return keywords.filter((keyword) => text.includes(keyword)).length;
}

function countChar(text: string, char: string): number {
  return text.split(char).length - 1;
}

export function defaultQueryProfile(): QueryProfile {
  return {
    complexity: 0,
    domain: "general",
    topics: [],
    queryType: "statement",
    formatRequirements: [],
    requiresCode: false,
    requiresReasoning: false,
    requiresCreativity: false,
    languages: ["unknown"],
    sentiment: "neutral",
    urgency: "normal",
  };
}

/**
 * Keyword-driven query classification. Every lookup table comes from
 * `server/data/query-rules.json`; matching is substring-based on the
 * lower-cased query.
 */
export class QueryAnalyzerService extends BaseService {
  private readonly rules: QueryRules;
  private readonly cache: ManagedMap<string, QueryProfile>;

  constructor(options: QueryAnalyzerOptions) {
    super("QueryAnalyzerService");
    this.rules = options.rules ?? defaultQueryRules;
    this.cache = this.createManagedMap<string, QueryProfile>({ maxSize: options.cacheSize, strategy: "lru" });
  }

  analyze(query: string): QueryProfile {
    const cached = this.cache.get(query);
    if (cached) {
      return structuredClone(cached);
    }

    const profile = query.length === 0 ? defaultQueryProfile() : this.buildProfile(query);
    this.cache.set(query, profile);
    return structuredClone(profile);
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  destroy(): void {
    this.cache.clear();
    this.unregister();
  }

  private buildProfile(query: string): QueryProfile {
    const lower = query.toLowerCase();
    const { domain, topics } = this.classifyDomain(lower);

    return {
      complexity: this.estimateComplexity(query, lower),
      domain,
      topics,
      queryType: this.classifyQueryType(lower),
      formatRequirements: this.detectFormatRequirements(lower),
      requiresCode: containsAny(lower, this.rules.capabilities.code),
      requiresReasoning: containsAny(lower, this.rules.capabilities.reasoning),
      requiresCreativity: containsAny(lower, this.rules.capabilities.creativity),
      languages: this.detectLanguages(query),
      sentiment: this.classifySentiment(lower),
      urgency: containsAny(lower, this.rules.urgency) ? "high" : "normal",
    };
  }

  private estimateComplexity(query: string, lower: string): number {
    // code points, so an emoji counts once
    const raw =
      [...query].length / 100 +
      countChar(query, ",") * 0.1 +
      countChar(query, "?") * 0.3 +
      countHits(lower, this.rules.complexityIndicators) * 0.5;
    return Math.min(10, Math.round(raw * 100) / 100);
  }

  private classifyDomain(lower: string): { domain: Domain; topics: string[] } {
    let best: Domain = "general";
    let bestScore = 0;
    const topics: string[] = [];

    for (const { name, keywords } of this.rules.domains) {
      const hits = keywords.filter((keyword) => lower.includes(keyword));
      for (const hit of hits) {
        if (!topics.includes(hit)) topics.push(hit);
      }
      // strict comparison keeps the first-declared domain on ties
      if (hits.length > bestScore) {
        best = name;
        bestScore = hits.length;
      }
    }

    return { domain: best, topics };
  }

  private classifyQueryType(lower: string): QueryType {
    const rule = this.rules.queryTypes.find(({ keywords }) => containsAny(lower, keywords));
    if (rule) return rule.type;
    return lower.includes("?") ? "question" : "statement";
  }

  private detectFormatRequirements(lower: string): FormatRequirement[] {
    const flags: FormatRequirement[] = [];
    for (const { flag, keywords } of this.rules.formatRequirements) {
      if (!flags.includes(flag) && containsAny(lower, keywords)) {
        flags.push(flag);
      }
    }
    return flags;
  }

  private detectLanguages(query: string): Language[] {
    const detected: Language[] = [];
    if (CJK_PATTERN.test(query)) detected.push("chinese");
    if (LATIN_PATTERN.test(query)) detected.push("english");
    return detected.length > 0 ? detected : ["unknown"];
  }

  private classifySentiment(lower: string): QueryProfile["sentiment"] {
    const positive = countHits(lower, this.rules.sentiment.positive);
    const negative = countHits(lower, this.rules.sentiment.negative);
    if (positive > negative) return "positive";
    if (negative > positive) return "negative";
    return "neutral";
  }
}

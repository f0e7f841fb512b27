import { z } from "zod";
import type { Response } from "express";
import { feedbackScoreInputSchema, templateSelectionStrategySchema } from "@shared/schema";

const querySchema = z.string().min(1, "Query is required").max(20000, "Query too long");

const generationParamsSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().max(32768).optional(),
});

export const analyzeRequestSchema = z.object({
  query: querySchema,
});

export const selectModelRequestSchema = z.object({
  query: querySchema,
  candidates: z.array(z.string().min(1)).optional(),
});

export const feedbackRequestSchema = z.object({
  conversationId: z.string().min(1, "Conversation ID is required"),
  query: querySchema,
  responses: z.record(z.string()).refine((value) => Object.keys(value).length > 0, "At least one response is required"),
  selectedResponse: z.string().min(1, "Selected response is required"),
  score: feedbackScoreInputSchema,
  feedbackText: z.string().max(5000).nullish(),
});

export const exportRequestSchema = z.object({
  split: z.boolean().optional(),
  evalRatio: z.number().min(0).max(0.9).optional(),
  minScore: z.number().min(0).max(1).optional(),
  maxRecords: z.number().int().positive().optional(),
  format: z.enum(["json", "jsonl"]).optional(),
});

export const toggleRequestSchema = z
  .object({
    optimization: z.boolean().optional(),
    feedbackCollection: z.boolean().optional(),
    templateStrategy: templateSelectionStrategySchema.optional(),
  })
  .refine(
    (value) =>
      value.optimization !== undefined || value.feedbackCollection !== undefined || value.templateStrategy !== undefined,
    { message: "Specify optimization, feedbackCollection or templateStrategy" },
  );

export const discussionRequestSchema = z.object({
  query: querySchema,
  models: z.array(z.string().min(1)).min(1).optional(),
  rounds: z.number().int().min(1).max(10).optional(),
  params: generationParamsSchema.optional(),
});

export const respondRequestSchema = z.object({
  query: querySchema,
  conversationId: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  useGroupDiscussion: z.boolean().optional(),
  systemPrompt: z.string().optional(),
  params: generationParamsSchema.optional(),
});

export const assistantFeedbackRequestSchema = z.object({
  conversationId: z.string().min(1, "Conversation ID is required"),
  query: querySchema,
  selectedResponse: z.string().min(1, "Selected response is required"),
  score: feedbackScoreInputSchema,
  feedbackText: z.string().max(5000).nullish(),
});

export const assistantSettingsRequestSchema = z
  .object({
    autoSelectModel: z.boolean().optional(),
    useGroupDiscussion: z.boolean().optional(),
  })
  .refine((value) => value.autoSelectModel !== undefined || value.useGroupDiscussion !== undefined, {
    message: "Specify autoSelectModel or useGroupDiscussion",
  });

export const idParamSchema = z.object({
  id: z.string().min(1),
});

export const conversationParamSchema = z.object({
  conversationId: z.string().min(1),
});

export interface ValidationIssue {
  path: string;
  message: string;
}

export function formatZodIssues(error: z.ZodError): ValidationIssue[] {
  return error.errors.map((e) => ({
    path: e.path.join("."),
    message: e.message,
  }));
}

/**
 * Parses `value` with `schema`. On failure answers 400 with the issues and
 * returns undefined, so handlers can `if (!body) return;`.
 */
export function parseOr400<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  value: unknown,
  res: Response,
  error = "Validation failed",
): Output | undefined {
  const result = schema.safeParse(value);
  if (!result.success) {
    res.status(400).json({ error, details: formatZodIssues(result.error) });
    return undefined;
  }
  return result.data;
}

import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import type { ComparisonRecord, FeedbackRecord, StoredRecord } from "@shared/schema";
import { fileTimestamp } from "../lib/file-timestamp";

export const EXPORT_FORMAT_VERSION = "1.0";

export interface FeedbackExportItem {
  id: string;
  prompt: string;
  response: string;
  score: number | null;
  model: string;
  feedback: string | null;
  conversation_id: string;
  timestamp: string;
}

export interface ComparisonExportItem {
  id: string;
  prompt: string;
  chosen: string;
  rejected: string;
  chosen_model: string;
  rejected_model: string;
  conversation_id: string;
  timestamp: string;
}

export interface ExportPartition {
  feedback: FeedbackExportItem[];
  comparisons: ComparisonExportItem[];
}

export interface ExportMetadata {
  timestamp: string;
  version: string;
  recordCount: number;
  split: boolean;
  evalRatio?: number;
}

export type ExportBundle =
  | ({ metadata: ExportMetadata & { split: false } } & ExportPartition)
  | { metadata: ExportMetadata & { split: true }; train: ExportPartition; eval: ExportPartition };

export type ExportFormat = "json" | "jsonl";

export interface ExportOptions {
  split?: boolean;
  evalRatio?: number;
  minScore?: number;
  maxRecords?: number;
  format?: ExportFormat;
  random?: () => number;
}

export function toFeedbackItem(record: FeedbackRecord): FeedbackExportItem {
  return {
    id: record.id,
    prompt: record.query,
    response: record.responses[record.selectedResponse] ?? "",
    score: record.feedbackScore,
    model: record.selectedResponse,
    feedback: record.feedbackText,
    conversation_id: record.conversationId,
    timestamp: record.timestamp,
  };
}

export function toComparisonItem(record: ComparisonRecord): ComparisonExportItem {
  return {
    id: record.id,
    prompt: record.query,
    chosen: record.chosen,
    rejected: record.rejected,
    chosen_model: record.chosenModel,
    rejected_model: record.rejectedModel,
    conversation_id: record.conversationId,
    timestamp: record.timestamp,
  };
}

/**
 * Shuffles a copy and cuts it so the training side keeps at least one item
 * whenever there is any.
 */
export function splitTrainEval<T>(items: readonly T[], evalRatio: number, random: () => number): { train: T[]; eval: T[] } {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  if (shuffled.length === 0) return { train: [], eval: [] };
  const cut = Math.max(1, Math.floor(shuffled.length * (1 - evalRatio)));
  return { train: shuffled.slice(0, cut), eval: shuffled.slice(cut) };
}

export function buildExportBundle(records: readonly StoredRecord[], options: ExportOptions = {}): ExportBundle {
  let selected = records.filter((record) => {
    if (options.minScore === undefined || record.type !== "feedback") return true;
    return record.feedbackScore !== null && record.feedbackScore >= options.minScore;
  });
  if (options.maxRecords !== undefined) {
    selected = selected.slice(0, Math.max(0, options.maxRecords));
  }

  const feedback: FeedbackExportItem[] = [];
  const comparisons: ComparisonExportItem[] = [];
  for (const record of selected) {
    if (record.type === "feedback") feedback.push(toFeedbackItem(record));
    else comparisons.push(toComparisonItem(record));
  }

  const baseMetadata = {
    timestamp: new Date().toISOString(),
    version: EXPORT_FORMAT_VERSION,
    recordCount: feedback.length + comparisons.length,
  };

  if (!options.split) {
    return { metadata: { ...baseMetadata, split: false }, feedback, comparisons };
  }

  const evalRatio = options.evalRatio ?? 0.1;
  const random = options.random ?? Math.random;
  const feedbackSplit = splitTrainEval(feedback, evalRatio, random);
  const comparisonSplit = splitTrainEval(comparisons, evalRatio, random);

  return {
    metadata: { ...baseMetadata, split: true, evalRatio },
    train: { feedback: feedbackSplit.train, comparisons: comparisonSplit.train },
    eval: { feedback: feedbackSplit.eval, comparisons: comparisonSplit.eval },
  };
}

/** One JSON object per line, each tagged with its kind (and split, if any). */
export function toJsonl(bundle: ExportBundle): string {
  const lines: string[] = [];
  const emit = (partition: ExportPartition, split?: "train" | "eval"): void => {
    for (const item of partition.feedback) lines.push(JSON.stringify({ type: "feedback", split, ...item }));
    for (const item of partition.comparisons) lines.push(JSON.stringify({ type: "comparison", split, ...item }));
  };

  if ("train" in bundle) {
    emit(bundle.train, "train");
    emit(bundle.eval, "eval");
  } else {
    emit(bundle);
  }
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

/** Writes `feedback_export_<YYYYMMDD_HHMMSS>.<json|jsonl>` into `dir`. */
export function writeExportFile(dir: string, bundle: ExportBundle, format: ExportFormat = "json", now = new Date()): string {
  mkdirSync(dir, { recursive: true });
  const filePath = join(dir, `feedback_export_${fileTimestamp(now)}.${format}`);
  const body = format === "jsonl" ? toJsonl(bundle) : JSON.stringify(bundle, null, 2);
  writeFileSync(filePath, body, "utf-8");
  return filePath;
}

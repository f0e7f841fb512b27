import { and, avg, count, desc, eq, gte, isNotNull, lte, sql, type SQL } from "drizzle-orm";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { v4 as uuidv4 } from "uuid";
import {
  comparisons,
  feedback,
  insertComparisonDbSchema,
  insertFeedbackDbSchema,
  insertStatDbSchema,
  stats,
  type ComparisonDb,
  type ComparisonRecord,
  type FeedbackDb,
  type FeedbackRecord,
  type FeedbackStats,
  type Metadata,
  type StatDb,
  type StatRecord,
  type StoredRecord,
} from "@shared/schema";
import {
  describeTable,
  IN_MEMORY_PATH,
  openDatabase,
  quoteIdentifier,
  sqlLiteral,
  syncTableSchema,
  type DatabaseHandle,
  type FeedbackDatabase,
  type TableSpec,
} from "./db";
import { BaseService } from "./lib/base-service";
import { describeError, isMissingColumnError, StoreError } from "./lib/errors";
import { fileTimestamp } from "./lib/file-timestamp";

export type FeedbackInput = Omit<FeedbackRecord, "metadata"> & { metadata?: Metadata };
export type ComparisonInput = Omit<ComparisonRecord, "metadata"> & { metadata?: Metadata };

export interface IFeedbackStorage {
  saveFeedback(record: FeedbackInput): string | null;
  saveComparison(record: ComparisonInput): string | null;
  getFeedback(id: string): FeedbackRecord | null;
  getComparison(id: string): ComparisonRecord | null;
  getAllFeedback(): StoredRecord[];
  getTotalCount(): number;
  getCountByScore(minScore?: number, maxScore?: number): number;
  deleteFeedback(id: string): boolean;
  deleteComparison(id: string): boolean;
  clearAllData(): boolean;
  updateStat(statType: string, value: number, metadata?: Metadata): boolean;
  getStats(statType?: string, limit?: number): StatRecord[];
  getFeedbackStats(): FeedbackStats | null;
  backupDatabase(backupPath?: string): string | null;
  restoreDatabase(backupPath: string): boolean;
  close(): void;
}

export interface FeedbackStorageOptions {
  dbPath: string;
  backupDir?: string;
}

const TABLE_SPECS: readonly TableSpec[] = [describeTable(feedback), describeTable(comparisons), describeTable(stats)];
const MAX_SCHEMA_RETRIES = 1;
const POSITIVE_THRESHOLD = 0.8;
const NEGATIVE_THRESHOLD = 0.3;
const DAILY_WINDOW = 30;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonObject(text: string | null): Record<string, unknown> {
  if (!text) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function parseResponses(text: string): Record<string, string> {
  const parsed = parseJsonObject(text);
  const responses: Record<string, string> = {};
  for (const [model, value] of Object.entries(parsed)) {
    if (typeof value === "string") responses[model] = value;
  }
  return responses;
}

function dbToFeedback(row: FeedbackDb): FeedbackRecord {
  return {
    id: row.id,
    timestamp: row.timestamp,
    conversationId: row.conversationId,
    query: row.query,
    responses: parseResponses(row.responses),
    selectedResponse: row.selectedResponse,
    feedbackScore: row.feedbackScore ?? null,
    feedbackText: row.feedbackText ?? null,
    metadata: parseJsonObject(row.metadata),
  };
}

function dbToComparison(row: ComparisonDb): ComparisonRecord {
  return {
    id: row.id,
    timestamp: row.timestamp,
    conversationId: row.conversationId,
    query: row.query,
    chosen: row.chosen,
    rejected: row.rejected,
    chosenModel: row.chosenModel,
    rejectedModel: row.rejectedModel,
    metadata: parseJsonObject(row.metadata),
  };
}

function dbToStat(row: StatDb): StatRecord {
  return {
    id: row.id,
    timestamp: row.timestamp,
    statType: row.statType,
    value: row.value,
    metadata: parseJsonObject(row.metadata),
  };
}

function isSqlRow(value: unknown): value is { sql: string } {
  return typeof value === "object" && value !== null && "sql" in value && typeof value.sql === "string";
}

/**
 * SQLite-backed feedback persistence. Every call is synchronous; writes run
 * in a transaction and a failed operation is logged and reported through its
 * return value rather than thrown.
 */
export class FeedbackStorage extends BaseService implements IFeedbackStorage {
  private readonly handle: DatabaseHandle;
  private readonly db: FeedbackDatabase;
  private readonly dbPath: string;
  private readonly backupDir: string;
  private closed = false;

  constructor(options: FeedbackStorageOptions) {
    super("FeedbackStorage");
    this.dbPath = options.dbPath;
    this.backupDir = options.backupDir ?? join(dirname(options.dbPath === IN_MEMORY_PATH ? "." : options.dbPath), "backups");
    this.handle = openDatabase(options.dbPath);
    this.db = this.handle.db;
    this.ensureSchema();
  }

  saveFeedback(record: FeedbackInput): string | null {
    return this.run("saveFeedback", null, () => {
      const row = insertFeedbackDbSchema.parse({
        id: record.id,
        timestamp: record.timestamp,
        conversationId: record.conversationId,
        query: record.query,
        responses: JSON.stringify(record.responses),
        selectedResponse: record.selectedResponse,
        feedbackScore: record.feedbackScore,
        feedbackText: record.feedbackText,
        metadata: JSON.stringify(record.metadata ?? {}),
      });
      const { id, ...changes } = row;
      this.transact("saveFeedback", (tx) =>
        tx.insert(feedback).values(row).onConflictDoUpdate({ target: feedback.id, set: changes }).run(),
      );
      return id;
    });
  }

  saveComparison(record: ComparisonInput): string | null {
    return this.run("saveComparison", null, () => {
      const row = insertComparisonDbSchema.parse({
        id: record.id,
        timestamp: record.timestamp,
        conversationId: record.conversationId,
        query: record.query,
        chosen: record.chosen,
        rejected: record.rejected,
        chosenModel: record.chosenModel,
        rejectedModel: record.rejectedModel,
        metadata: JSON.stringify(record.metadata ?? {}),
      });
      const { id, ...changes } = row;
      this.transact("saveComparison", (tx) =>
        tx.insert(comparisons).values(row).onConflictDoUpdate({ target: comparisons.id, set: changes }).run(),
      );
      return id;
    });
  }

  getFeedback(id: string): FeedbackRecord | null {
    return this.run("getFeedback", null, () => {
      const row = this.db.select().from(feedback).where(eq(feedback.id, id)).get();
      return row ? dbToFeedback(row) : null;
    });
  }

  getComparison(id: string): ComparisonRecord | null {
    return this.run("getComparison", null, () => {
      const row = this.db.select().from(comparisons).where(eq(comparisons.id, id)).get();
      return row ? dbToComparison(row) : null;
    });
  }

  getAllFeedback(): StoredRecord[] {
    return this.run("getAllFeedback", [], () => {
      const feedbackRows = this.db.select().from(feedback).orderBy(desc(feedback.timestamp)).all();
      const comparisonRows = this.db.select().from(comparisons).orderBy(desc(comparisons.timestamp)).all();

      const merged: StoredRecord[] = [
        ...feedbackRows.map((row): StoredRecord => ({ type: "feedback", ...dbToFeedback(row) })),
        ...comparisonRows.map((row): StoredRecord => ({ type: "pairwise_comparison", ...dbToComparison(row) })),
      ];
      // Array.prototype.sort is stable, so equal timestamps keep feedback first
      return merged.sort((a, b) => (a.timestamp < b.timestamp ? 1 : a.timestamp > b.timestamp ? -1 : 0));
    });
  }

  getTotalCount(): number {
    return this.run("getTotalCount", 0, () => this.db.select({ value: count() }).from(feedback).get()?.value ?? 0);
  }

  getCountByScore(minScore?: number, maxScore?: number): number {
    return this.run("getCountByScore", 0, () => {
      const conditions: SQL[] = [isNotNull(feedback.feedbackScore)];
      if (minScore !== undefined) conditions.push(gte(feedback.feedbackScore, minScore));
      if (maxScore !== undefined) conditions.push(lte(feedback.feedbackScore, maxScore));
      return (
        this.db
          .select({ value: count() })
          .from(feedback)
          .where(and(...conditions))
          .get()?.value ?? 0
      );
    });
  }

  deleteFeedback(id: string): boolean {
    return this.run("deleteFeedback", false, () => {
      const result = this.transact("deleteFeedback", (tx) => tx.delete(feedback).where(eq(feedback.id, id)).run());
      return result.changes > 0;
    });
  }

  deleteComparison(id: string): boolean {
    return this.run("deleteComparison", false, () => {
      const result = this.transact("deleteComparison", (tx) =>
        tx.delete(comparisons).where(eq(comparisons.id, id)).run(),
      );
      return result.changes > 0;
    });
  }

  clearAllData(): boolean {
    return this.run("clearAllData", false, () => {
      this.transact("clearAllData", (tx) => {
        tx.delete(feedback).run();
        tx.delete(comparisons).run();
        tx.delete(stats).run();
      });
      this.log("Cleared all feedback data");
      return true;
    });
  }

  updateStat(statType: string, value: number, metadata: Metadata = {}): boolean {
    return this.run("updateStat", false, () => {
      const row = insertStatDbSchema.parse({
        id: `${statType}_${uuidv4()}`,
        timestamp: new Date().toISOString(),
        statType,
        value,
        metadata: JSON.stringify(metadata),
      });
      this.transact("updateStat", (tx) => tx.insert(stats).values(row).run());
      return true;
    });
  }

  getStats(statType?: string, limit = 100): StatRecord[] {
    return this.run("getStats", [], () => {
      const query = this.db
        .select()
        .from(stats)
        .where(statType === undefined ? undefined : eq(stats.statType, statType))
        .orderBy(desc(stats.timestamp))
        .limit(limit);
      return query.all().map(dbToStat);
    });
  }

  getFeedbackStats(): FeedbackStats | null {
    return this.run("getFeedbackStats", null, () => {
      const totals = this.db
        .select({
          total: count(),
          positive: sql<number>`coalesce(sum(case when ${feedback.feedbackScore} >= ${POSITIVE_THRESHOLD} then 1 else 0 end), 0)`,
          negative: sql<number>`coalesce(sum(case when ${feedback.feedbackScore} <= ${NEGATIVE_THRESHOLD} then 1 else 0 end), 0)`,
          average: avg(feedback.feedbackScore),
        })
        .from(feedback)
        .where(isNotNull(feedback.feedbackScore))
        .get();

      const total = totals?.total ?? 0;
      const positive = Number(totals?.positive ?? 0);
      const negative = Number(totals?.negative ?? 0);
      const average = totals?.average ? Number(totals.average) : 0;

      const byModel = this.db
        .select({ model: feedback.selectedResponse, value: count() })
        .from(feedback)
        .groupBy(feedback.selectedResponse)
        .orderBy(desc(count()))
        .all();

      const day = sql<string>`substr(${feedback.timestamp}, 1, 10)`;
      const daily = this.db
        .select({ date: day, value: count() })
        .from(feedback)
        .groupBy(day)
        .orderBy(desc(day))
        .limit(DAILY_WINDOW)
        .all();

      const comparisonCount = this.db.select({ value: count() }).from(comparisons).get()?.value ?? 0;

      return {
        totalFeedback: total,
        positiveFeedback: positive,
        negativeFeedback: negative,
        neutralFeedback: total - positive - negative,
        averageScore: average,
        modelDistribution: Object.fromEntries(byModel.map((row): [string, number] => [row.model, row.value])),
        comparisonCount,
        dailyCounts: daily.map((row) => ({ date: row.date, count: row.value })),
      };
    });
  }

  /**
   * Writes a plain SQL dump of all tables. Without a path the dump lands in
   * `backups/feedback_backup_<timestamp>.sql` beside the database.
   */
  backupDatabase(backupPath?: string): string | null {
    const target = backupPath ?? join(this.backupDir, `feedback_backup_${fileTimestamp(new Date(), true)}.sql`);
    try {
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, this.dumpSql(), "utf-8");
      this.log("Database backed up", { path: target });
      return target;
    } catch (error) {
      this.logError("Database backup failed", { path: target, error: describeError(error) });
      return null;
    }
  }

  restoreDatabase(backupPath: string): boolean {
    if (!existsSync(backupPath)) {
      this.logError("Backup file not found", { path: backupPath });
      return false;
    }

    try {
      const script = readFileSync(backupPath, "utf-8");
      if (this.backupDatabase() === null) {
        this.logWarn("Could not back up current state before restore", { path: backupPath });
      }

      const { sqlite } = this.handle;
      sqlite.transaction(() => {
        for (const spec of TABLE_SPECS) {
          sqlite.exec(`DROP TABLE IF EXISTS ${quoteIdentifier(spec.name)}`);
        }
        sqlite.exec(script);
      })();

      this.ensureSchema();
      this.log("Database restored", { path: backupPath });
      return true;
    } catch (error) {
      this.logError("Database restore failed", { path: backupPath, error: describeError(error) });
      return false;
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.handle.sqlite.close();
  }

  destroy(): void {
    this.close();
    this.unregister();
  }

  get path(): string {
    return this.dbPath;
  }

  private ensureSchema(): void {
    for (const spec of TABLE_SPECS) {
      const outcome = syncTableSchema(this.handle.sqlite, spec);
      if (outcome !== "unchanged") {
        this.logDebug("Table schema synced", { table: spec.name, outcome });
      }
    }
  }

  private transact<T>(operation: string, fn: (tx: Transaction) => T): T {
    try {
      return this.db.transaction(fn);
    } catch (error) {
      throw new StoreError(operation, error);
    }
  }

  /**
   * Runs an operation, healing the schema and retrying once when SQLite
   * reports a missing column. Any other failure yields `fallback`.
   */
  private run<T>(operation: string, fallback: T, fn: () => T): T {
    for (let attempt = 0; ; attempt++) {
      try {
        return fn();
      } catch (error) {
        if (attempt < MAX_SCHEMA_RETRIES && isMissingColumnError(error)) {
          this.logWarn("Schema mismatch detected, repairing", { operation, error: describeError(error) });
          try {
            this.ensureSchema();
          } catch (repairError) {
            this.logError("Schema repair failed", { operation, error: describeError(repairError) });
            return fallback;
          }
          continue;
        }
        this.logError(`${operation} failed`, { error: describeError(error) });
        return fallback;
      }
    }
  }

  private dumpSql(): string {
    const { sqlite } = this.handle;
    const lines: string[] = [`-- feedback database dump ${new Date().toISOString()}`];

    for (const spec of TABLE_SPECS) {
      const ddl = sqlite.prepare("SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ?").get(spec.name);
      if (!isSqlRow(ddl)) continue;
      lines.push(`${ddl.sql};`);

      for (const row of sqlite.prepare(`SELECT * FROM ${quoteIdentifier(spec.name)}`).all()) {
        if (!isRecord(row)) continue;
        const columns = Object.keys(row);
        const values = columns.map((column) => sqlLiteral(row[column]));
        lines.push(
          `INSERT INTO ${quoteIdentifier(spec.name)} (${columns.map(quoteIdentifier).join(", ")}) VALUES (${values.join(", ")});`,
        );
      }

      const indexes = sqlite
        .prepare("SELECT sql FROM sqlite_master WHERE type = 'index' AND tbl_name = ? AND sql IS NOT NULL")
        .all(spec.name);
      for (const index of indexes) {
        if (isSqlRow(index)) lines.push(`${index.sql};`);
      }
    }

    return `${lines.join("\n")}\n`;
  }
}

type Transaction = Parameters<Parameters<FeedbackDatabase["transaction"]>[0]>[0];

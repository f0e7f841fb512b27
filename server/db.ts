import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { SQL } from "drizzle-orm";
import { getTableConfig, type SQLiteTable } from "drizzle-orm/sqlite-core";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { logger } from "./lib/logger";

export type FeedbackDatabase = BetterSQLite3Database;

export interface DatabaseHandle {
  sqlite: Database.Database;
  db: FeedbackDatabase;
}

export const IN_MEMORY_PATH = ":memory:";

export function openDatabase(dbPath: string): DatabaseHandle {
  if (dbPath !== IN_MEMORY_PATH) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const sqlite = new Database(dbPath);
  if (dbPath !== IN_MEMORY_PATH) {
    sqlite.pragma("journal_mode = WAL");
  }
  logger.db("Opened database", { path: dbPath });
  return { sqlite, db: drizzle(sqlite) };
}

// ---------------------------------------------------------------------------
// Schema derivation: the drizzle table definitions are the source of truth
// for both queries and the DDL used to create or rebuild tables.
// ---------------------------------------------------------------------------

export interface ColumnSpec {
  name: string;
  ddl: string;
}

export interface TableSpec {
  name: string;
  columns: ColumnSpec[];
  createSql: string;
  indexSql: string[];
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function sqlLiteral(value: unknown): string {
  if (value === null || value === undefined) return "NULL";
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : "NULL";
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "boolean") return value ? "1" : "0";
  if (Buffer.isBuffer(value)) return `X'${value.toString("hex")}'`;
  return `'${String(value).replace(/'/g, "''")}'`;
}

export function describeTable(table: SQLiteTable): TableSpec {
  const config = getTableConfig(table);

  const columns = config.columns.map((column) => {
    let ddl = `${quoteIdentifier(column.name)} ${column.getSQLType().toUpperCase()}`;
    if (column.primary) ddl += " PRIMARY KEY";
    else if (column.notNull) ddl += " NOT NULL";
    if (column.hasDefault && !(column.default instanceof SQL)) {
      ddl += ` DEFAULT ${sqlLiteral(column.default)}`;
    }
    return { name: column.name, ddl };
  });

  const indexSql = config.indexes.map((index) => {
    const indexed = index.config.columns.flatMap((column) =>
      column instanceof SQL ? [] : [quoteIdentifier(column.name)],
    );
    const unique = index.config.unique ? "UNIQUE " : "";
    return `CREATE ${unique}INDEX IF NOT EXISTS ${quoteIdentifier(index.config.name)} ON ${quoteIdentifier(config.name)} (${indexed.join(", ")})`;
  });

  return {
    name: config.name,
    columns,
    createSql: `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(config.name)} (${columns.map((c) => c.ddl).join(", ")})`,
    indexSql,
  };
}

function isTableInfoRow(row: unknown): row is { name: string } {
  return typeof row === "object" && row !== null && "name" in row && typeof row.name === "string";
}

export function existingColumns(sqlite: Database.Database, tableName: string): string[] {
  return sqlite
    .prepare(`PRAGMA table_info(${quoteIdentifier(tableName)})`)
    .all()
    .filter(isTableInfoRow)
    .map((row) => row.name);
}

export type SchemaSyncOutcome = "created" | "rebuilt" | "unchanged";

/**
 * Brings one table in line with its declared shape. A table missing declared
 * columns is copied aside, recreated, and refilled from the columns both
 * shapes share; rows keep their values and new NOT NULL text columns take ''.
 */
export function syncTableSchema(sqlite: Database.Database, spec: TableSpec): SchemaSyncOutcome {
  const present = existingColumns(sqlite, spec.name);

  if (present.length === 0) {
    sqlite.exec(spec.createSql);
    for (const statement of spec.indexSql) sqlite.exec(statement);
    return "created";
  }

  const missing = spec.columns.filter((column) => !present.includes(column.name));
  if (missing.length === 0) {
    for (const statement of spec.indexSql) sqlite.exec(statement);
    return "unchanged";
  }

  const table = quoteIdentifier(spec.name);
  const temp = quoteIdentifier(`${spec.name}_temp`);
  const shared = spec.columns
    .filter((column) => present.includes(column.name))
    .map((column) => quoteIdentifier(column.name))
    .join(", ");

  sqlite.transaction(() => {
    sqlite.exec(`DROP TABLE IF EXISTS ${temp}`);
    sqlite.exec(`CREATE TABLE ${temp} AS SELECT * FROM ${table}`);
    sqlite.exec(`DROP TABLE ${table}`);
    sqlite.exec(spec.createSql);
    if (shared.length > 0) {
      sqlite.exec(`INSERT INTO ${table} (${shared}) SELECT ${shared} FROM ${temp}`);
    }
    sqlite.exec(`DROP TABLE ${temp}`);
    for (const statement of spec.indexSql) sqlite.exec(statement);
  })();

  logger.warn("Rebuilt table to match schema", {
    table: spec.name,
    addedColumns: missing.map((column) => column.name),
  });
  return "rebuilt";
}

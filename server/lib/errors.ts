export class StoreError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${describeError(cause)}`, { cause });
    this.name = "StoreError";
    this.operation = operation;
  }
}

export class ConfigError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = "ConfigError";
    this.source = source;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const MISSING_COLUMN_PATTERN = /no such column|has no column named/i;

/**
 * True when the error (or anything in its cause chain) is SQLite reporting a
 * column the statement expected but the table lacks.
 */
export function isMissingColumnError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (MISSING_COLUMN_PATTERN.test(current.message)) return true;
    current = current.cause;
  }
  return false;
}

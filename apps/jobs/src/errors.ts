/**
 * Pipeline error types
 *
 * Structural problems (absent files, absent columns, broken config) abort the
 * stage. Content problems (unknown team codes, missing scores) never throw;
 * they degrade per row and are reported by the stage that saw them.
 */

export class MissingInputError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly description: string = 'input file'
  ) {
    super(`Missing ${description}: ${filePath}`);
    this.name = 'MissingInputError';
  }
}

export class SchemaError extends Error {
  constructor(
    public readonly table: string,
    public readonly missing: string[]
  ) {
    super(`${table} missing columns: ${missing.join(', ')}`);
    this.name = 'SchemaError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(source ? `${message} (${source})` : message);
    this.name = 'ConfigError';
  }
}

export const errMsg = (e: unknown): string => (e instanceof Error ? e.message : String(e));

/**
 * Raised when a dataset cannot be read at all (missing file, HTTP failure).
 * Schema and parse failures are subclasses so callers can catch one type.
 */
export class DatasetLoadError extends Error {
  public readonly source: string;

  public constructor(message: string, source: string) {
    super(message);
    this.name = 'DatasetLoadError';
    this.source = source;
  }
}

export class SchemaError extends DatasetLoadError {
  public readonly missingColumns: readonly string[];

  public constructor(missingColumns: readonly string[], source: string) {
    super(`Missing required column(s): ${missingColumns.join(', ')}`, source);
    this.name = 'SchemaError';
    this.missingColumns = missingColumns;
  }
}

export class ParseError extends DatasetLoadError {
  /** 1-based data row, header excluded */
  public readonly row: number;
  public readonly column: string;
  public readonly value: string;

  public constructor(row: number, column: string, value: string, source: string, reason = 'is not a number') {
    super(`Row ${row}, column "${column}": "${value}" ${reason}`, source);
    this.name = 'ParseError';
    this.row = row;
    this.column = column;
    this.value = value;
  }
}

export class PlayerNotFoundError extends Error {
  public readonly playerName: string;

  public constructor(playerName: string) {
    super(`Player "${playerName}" is not in the current selection`);
    this.name = 'PlayerNotFoundError';
    this.playerName = playerName;
  }
}
